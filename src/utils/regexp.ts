export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const countMatches = (text: string, expression: RegExp): number =>
  Array.from(text.matchAll(expression)).length;
