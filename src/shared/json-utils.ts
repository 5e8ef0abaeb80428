/**
 * JSON.stringify replacer that writes bigint values as decimal strings.
 * Wei amounts and block numbers end up in log metadata as bigints.
 */
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
};
