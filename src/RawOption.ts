/** One parsed `name=value` (or bare `name`) occurrence. */
export interface RawOption {
  readonly name: string;
  /** Absent for bare flag syntax (`name` with no `=`). */
  readonly value?: string;
}

/**
 * The input to one decode pass: raw occurrences in source order, plus an
 * optional identifier that is decoded as if it were an option named `id`.
 */
export interface OptionSource {
  readonly options: readonly RawOption[];
  readonly id?: string;
}

/** Reserved name under which the source identifier is exposed. */
export const ID_OPTION_NAME = 'id';
