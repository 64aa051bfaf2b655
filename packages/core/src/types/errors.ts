export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type RankingInputErrorKind =
  | 'shape_mismatch'
  | 'invalid_value'
  | 'missing_field';

export class RankingInputError extends Error {
  readonly kind: RankingInputErrorKind;

  constructor(kind: RankingInputErrorKind, message: string) {
    super(message);
    this.name = 'RankingInputError';
    this.kind = kind;
  }
}
