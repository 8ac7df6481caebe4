/**
 * Strategy that turns the text of one field into a value of type `T`.
 *
 * Implementations throw a `ParseError` when the text is not a valid `T`.
 * Every field of a record layout carries exactly one conversion, so a field
 * type without a conversion cannot be declared at all.
 */
export interface Conversion<T> {
  parse(text: string): T;
}

/** Extract the value type produced by a conversion. */
export type ConvertedType<C> = C extends Conversion<infer T> ? T : never;

/** Wrap a plain parsing function as a `Conversion`. */
export function defineConversion<T>(parse: (text: string) => T): Conversion<T> {
  return { parse };
}
