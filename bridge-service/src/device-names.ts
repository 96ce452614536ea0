// Device name normalization utilities

/**
 * Slug conventions (used in legacy discovery topic paths):
 * - Lower case, diacritics folded to their base letter, letters such as
 *   `ß` or `ø` spelled out in ASCII
 * - Every run of characters outside [a-z0-9] collapses to one separator
 * - No leading or trailing separator
 */

const COMBINING_MARKS_REGEX = /[\u0300-\u036f]/g;

// Letters NFKD does not decompose
const TRANSLITERATIONS: Readonly<Record<string, string>> = {
  ß: 'ss',
  ẞ: 'SS',
  Æ: 'AE',
  æ: 'ae',
  Œ: 'OE',
  œ: 'oe',
  Ø: 'O',
  ø: 'o',
  Đ: 'D',
  đ: 'd',
  Ð: 'D',
  ð: 'd',
  Ł: 'L',
  ł: 'l',
  Þ: 'TH',
  þ: 'th',
  ı: 'i',
};
const TRANSLITERATION_REGEX = new RegExp(`[${Object.keys(TRANSLITERATIONS).join('')}]`, 'g');
const NON_ALNUM_RUN_REGEX = /[^a-z0-9]+/g;

/**
 * Slugify a display name, e.g. `Front Door (Café)` -> `front_door_cafe`
 */
export function slugifyDeviceName(name: string, separator = '_'): string {
  if (!name) return '';

  const folded = name
    .replace(TRANSLITERATION_REGEX, (letter) => TRANSLITERATIONS[letter] ?? '')
    .normalize('NFKD')
    .replace(COMBINING_MARKS_REGEX, '')
    .toLowerCase();

  return folded
    .replace(NON_ALNUM_RUN_REGEX, separator)
    .split(separator)
    .filter(Boolean)
    .join(separator);
}

/**
 * Strip the `key=` prefix the camera puts in front of single-value answers
 * (`type=AD410`, `name=Front Door`) and surrounding whitespace.
 */
export function stripValuePrefix(body: string, key: string): string {
  const trimmed = body.trim();
  const prefix = `${key}=`;
  return (trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed).trim();
}

/**
 * Pick the name shown in Home Assistant: explicit override first, then the
 * camera's machine name, then a name derived from the model.
 */
export function resolveDisplayName(machineName: string, deviceType: string, override?: string): string {
  if (override && override.trim()) return override.trim();
  if (machineName.trim()) return machineName.trim();
  return `Amcrest ${deviceType}`;
}
