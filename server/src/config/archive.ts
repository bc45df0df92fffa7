// Colonnes de la table `ps` (Planetary Systems) de l'archive NASA.
export const ARCHIVE_TABLE = 'ps';

export const ARCHIVE_COLUMNS = [
  'pl_name',
  'hostname',
  'pl_bmasse',
  'pl_orbper',
  'pl_orbsmax',
  'pl_orbeccen',
  'st_mass',
  'st_teff',
  'pl_rade'
] as const;

export type ArchiveColumn = (typeof ARCHIVE_COLUMNS)[number];

export const SERVER_NOT_NULL_COLUMNS: readonly ArchiveColumn[] = ['pl_bmasse', 'pl_orbper', 'pl_orbsmax', 'st_mass'];

export const SORT_COLUMN: ArchiveColumn = 'pl_orbper';

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 10_000;
