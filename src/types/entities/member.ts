/**
 * Group member entity type definitions
 */

export interface IMember {
  readonly id: string;
  readonly name: string;
  readonly location?: string;
}

/**
 * Operator-chosen subset of the filtered members, in filtered-list order
 */
export interface Selection {
  readonly memberIds: readonly string[];
}

interface RemovalResultBase {
  memberId: string;
  retries: number;
}

export interface RemovalSuccess extends RemovalResultBase {
  outcome: 'success';
}

export interface RemovalFailure extends RemovalResultBase {
  outcome: 'failure';
  reason: string;
  errorName: string;
}

export type RemovalResult = RemovalSuccess | RemovalFailure;

export interface GroupSession {
  readonly groupId: string;
  readonly accessToken: string;
}
