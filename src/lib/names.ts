// Names used by the character builder that the catalog spells differently.
const TRANSLATIONS: Record<string, string> = {
  // Abilities
  'Demon Unleashed': 'A Demon Unleashed',
  'Force Orb': 'Force Orbs',
  'Halt, Miscreant!': 'Halt Miscreant!',
  'Motivate Earth': 'Manipulate Earth',

  // Ancestries
  'Elf (high)': 'Elf, High',
  'Elf (wode)': 'Elf, Wode',

  // Ancestry features
  'Draconic Pride': 'Draconian Pride',
  Perseverence: 'Perseverance',
  'Resist the Unnatural': 'Resist the Supernatural',

  // Choice types
  'Elementalist Ward': 'Ward',

  // Classes & subclasses
  Chronokinetic: 'Disciple of the Chronokinetic',
  Cryokinetic: 'Disciple of the Cryokinetic',
  Metakinetic: 'Disciple of the Metakinetic',

  // Perks
  "I've Got You": "I've Got You!",
  'Put Your Back Into It': 'Put Your Back Into It!',
  Teamwork: 'Team Backbone',
  Prayer: 'Prayers',

  // Inciting incidents
  'Near-Death Experience': 'Near Death Experience',

  // Kits
  'Rapid Fire': 'Rapid-Fire',

  // Languages
  Anjali: 'Anjal',
  Kalliac: 'Kalliak',
  Yllric: 'Yllyric',

  // Psionic augmentations & wards
  'Battle Augmentation': 'Battle Augmentation ',
  'Steel Ward': 'Steel Ward ',
  'Talent Ward': 'Ward',

  // Skills
  Perform: 'Performance'
};

const TRANSLATION_INDEX = new Map<string, string>(
  Object.entries(TRANSLATIONS).map(([from, to]) => [from.toLowerCase(), to])
);

const FOLDED_CHARACTERS: Record<string, string> = {
  á: 'a', à: 'a', â: 'a', ä: 'a', å: 'a',
  é: 'e', è: 'e', ê: 'e', ë: 'e',
  í: 'i', ì: 'i', î: 'i', ï: 'i',
  ó: 'o', ò: 'o', ô: 'o', ö: 'o', ø: 'o',
  ú: 'u', ù: 'u', û: 'u', ü: 'u',
  ñ: 'n', ç: 'c', ý: 'y',
  Á: 'A', À: 'A', Â: 'A', Ä: 'A', Å: 'A',
  É: 'E', È: 'E', Ê: 'E', Ë: 'E',
  Í: 'I', Ì: 'I', Î: 'I', Ï: 'I',
  Ó: 'O', Ò: 'O', Ô: 'O', Ö: 'O', Ø: 'O',
  Ú: 'U', Ù: 'U', Û: 'U', Ü: 'U',
  Ñ: 'N', Ç: 'C', Ý: 'Y',
  Æ: 'AE', æ: 'ae', Œ: 'OE', œ: 'oe',
  Ð: 'D', ð: 'd', Þ: 'Th', þ: 'th',
  ß: 'ss',
  '\u00a0': ' ',
  '\u2013': '-', '\u2014': '-', '\u00ad': '-',
  '\u2018': "'", '\u2019': "'",
  '\u201c': '"', '\u201d': '"',
  '\u2026': '...'
};

const FOLD_REGEX = new RegExp(`[${Object.keys(FOLDED_CHARACTERS).join('')}]`, 'g');
const DISALLOWED_REGEX = /[^a-z0-9\s;:!@#$%^&*()\-+=?,]/gi;

export function sanitize(value?: string | null): string {
  return (value ?? '')
    .replace(FOLD_REGEX, (char) => FOLDED_CHARACTERS[char] ?? char)
    .replace(DISALLOWED_REGEX, '')
    .trim();
}

export function translate(value?: string | null): string {
  const input = value ?? '';
  return TRANSLATION_INDEX.get(input.toLowerCase()) ?? input;
}

export function normalizeName(value?: string | null): string {
  return sanitize(translate(value)).toLowerCase();
}

/** Fuzzy name equality: translation, sanitization and case folding. */
export function namesMatch(a?: string | null, b?: string | null): boolean {
  return normalizeName(a) === normalizeName(b);
}

export function namePrefixMatches(value: string | undefined, prefix: string): boolean {
  return sanitize(value).toLowerCase().startsWith(sanitize(prefix).toLowerCase());
}

const IMMUNITY_REGEX = /^(.*Immunity)/s;

/**
 * The builder files every immunity under a generic "Damage Modifier" label;
 * the immunity itself only appears at the start of the description.
 */
export function translateFeatureChoice(name?: string | null, description?: string | null): string {
  const raw = name ?? '';
  if (raw.toLowerCase() === 'damage modifier') {
    const match = IMMUNITY_REGEX.exec(description ?? '');
    return match ? match[1] : raw;
  }
  return translate(raw);
}

export function categoryKey(categories: Iterable<string>): string {
  return Array.from(categories, (category) => category.toLowerCase()).sort().join(',');
}

/** "war" → "War"; used to turn id slugs back into display names. */
export function titleCase(value: string): string {
  return value
    .split(/[\s_]+/)
    .filter(Boolean)
    .map((part) => part[0].toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}
