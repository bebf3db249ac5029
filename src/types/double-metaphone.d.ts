// double-metaphone 1.x is CommonJS and ships no declarations.
declare module 'double-metaphone' {
  /** Returns [primary, alternate] codes. */
  function doubleMetaphone(value: string): [string, string];
  export = doubleMetaphone;
}
