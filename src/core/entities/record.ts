/**
 * Wire numbers are kept as received; coercion happens in the cleaning stage.
 */
export type RawNumeric = number | string | null;

export type NamedEntity = {
  name: string | null;
};

export type CastMember = {
  name: string | null;
  character: string | null;
};

export type CrewMember = {
  name: string | null;
  job: string | null;
  department: string | null;
};

export type RecordCredits = {
  cast: CastMember[];
  crew: CrewMember[];
};

/**
 * One catalog entry as fetched, restricted to the fields the pipeline consumes.
 */
export type RawRecord = {
  id: number;
  title: string | null;
  tagline: string | null;
  releaseDate: string | null;
  originalLanguage: string | null;
  overview: string | null;
  budget: RawNumeric;
  revenue: RawNumeric;
  runtime: RawNumeric;
  popularity: RawNumeric;
  voteAverage: RawNumeric;
  voteCount: RawNumeric;
  genres: NamedEntity[];
  productionCompanies: NamedEntity[];
  productionCountries: NamedEntity[];
  spokenLanguages: NamedEntity[];
  collection: NamedEntity | null;
  credits: RecordCredits | null;
};

/**
 * Flattened record; every numeric field is a finite non-negative number or null.
 * List-valued fields are pipe-joined.
 */
export type CleanRecord = {
  id: number;
  title: string | null;
  tagline: string | null;
  releaseDate: string | null;
  genres: string | null;
  collection: string | null;
  originalLanguage: string | null;
  budgetMusd: number | null;
  revenueMusd: number | null;
  productionCompanies: string | null;
  productionCountries: string | null;
  spokenLanguages: string | null;
  voteCount: number | null;
  voteAverage: number | null;
  popularity: number | null;
  runtime: number | null;
  overview: string | null;
  cast: string | null;
  castSize: number | null;
  crewSize: number | null;
  directors: string | null;
};

export type MetricRecord = CleanRecord & {
  profit: number | null;
  roi: number | null;
};

export const LIST_SEPARATOR = "|";

/**
 * Splits a pipe-joined field back into its members.
 */
export const splitList = (value: string | null): string[] =>
  value === null
    ? []
    : value
        .split(LIST_SEPARATOR)
        .map((item) => item.trim())
        .filter(Boolean);
