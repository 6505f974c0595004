import type { Sheet } from '../../types/takeoff';

const RESPONSE_FORMAT =
  'Respond with JSON only, shaped as {"counts": {"<category>": {"<item>": <integer>}}} ' +
  'using the categories fixtures, controls, power, demo, technology. Omit items you cannot see.';

const FLOOR_NOTE =
  'If the sheet repeats the same floor plan once per floor, count the symbols of one floor view only.';

const seriesInstructions = (sheet: Sheet): string => {
  if (sheet.role === 'demolition') {
    return (
      'This is an electrical demolition plan. Count the numbered keynote references ' +
      'inside the drawing area and report them under "demo" keyed by the keynote number. ' +
      'Count floor boxes marked FB as "Demo Floor Box". Ignore numbers inside dimensions, ' +
      'grid lines and the title block.'
    );
  }
  if (sheet.sheetCode.startsWith('T')) {
    return (
      'This is a technology plan. Count data outlets under "technology" as "Cat 6 Jack", ' +
      'counting each port of multi-port outlets (WP2 is two jacks, 4C is four).'
    );
  }
  return (
    'This is an electrical new-work plan. Count fixture tags (F2, F4E, X1 and similar) under ' +
    '"fixtures", occupancy, daylight sensors and dimmers under "controls", and receptacles, ' +
    'switches and fire alarm devices under "power".'
  );
};

/** Natural-language counting brief for one rendered sheet. */
export const buildCountingInstructions = (sheet: Sheet): string =>
  [
    `Sheet ${sheet.sheetCode}${sheet.title ? ` (${sheet.title})` : ''}.`,
    seriesInstructions(sheet),
    'Ignore the legend, notes and title block.',
    FLOOR_NOTE,
    RESPONSE_FORMAT,
  ].join('\n');
