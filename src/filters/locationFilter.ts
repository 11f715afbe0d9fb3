import type { IMember } from '../types/entities/member';

export const normalizeLocation = (value: string): string => value.toLowerCase();

/**
 * Case-insensitive containment match on the member's location name.
 * Members without a location never match.
 */
export const matchesLocation = (member: IMember, targetLocation: string): boolean =>
  member.location !== undefined &&
  normalizeLocation(member.location).includes(normalizeLocation(targetLocation));

export const filterByLocation = (
  members: readonly IMember[],
  targetLocation: string
): IMember[] => members.filter(member => matchesLocation(member, targetLocation));
