/**
 * Lookups into catalogs this package does not own. Both take a batch of ids
 * and answer with the subset that exists.
 */
export interface RecordDirectory {
  existing(ids: number[]): Promise<Set<number>>;
}

export type UserDirectory = RecordDirectory;
export type LocationDirectory = RecordDirectory;

export const USER_DIRECTORY = 'USER_DIRECTORY';
export const LOCATION_DIRECTORY = 'LOCATION_DIRECTORY';
