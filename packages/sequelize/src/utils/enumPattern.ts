const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/** Anchored alternation matching exactly one of `values`. */
export function enumPattern(values: readonly string[]): RegExp {
  const alternatives = values.map((value) => value.replace(REGEX_SPECIALS, '\\$&'));
  return new RegExp(`^(?:${alternatives.join('|')})$`);
}
