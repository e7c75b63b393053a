const SIBILANT = /(?:s|x|z|ch|sh)$/i;
const CONSONANT_Y = /[^aeiou]y$/i;

export function pluralize(word: string): string {
  if (CONSONANT_Y.test(word)) return `${word.slice(0, -1)}ies`;
  if (SIBILANT.test(word)) return `${word}es`;
  return `${word}s`;
}

export function singularize(word: string): string {
  if (/[^aeiou]ies$/i.test(word)) return `${word.slice(0, -3)}y`;
  if (/(?:ss|x|z|ch|sh)es$/i.test(word)) return word.slice(0, -2);
  if (/(?:ss|us|is)$/i.test(word)) return word;
  if (/s$/i.test(word)) return word.slice(0, -1);
  return word;
}

/** `artist_albums` → `ArtistAlbums`; existing capitals are kept. */
export function pascalCase(name: string): string {
  const words = name.split(/[^A-Za-z0-9]+/).filter((word) => word.length > 0);
  const joined = words.map((word) => word[0].toUpperCase() + word.slice(1)).join('');
  return /^\d/.test(joined) ? `_${joined}` : joined;
}

export function lowerFirst(name: string): string {
  return name.length > 0 ? name[0].toLowerCase() + name.slice(1) : name;
}

/** Table name to class name: last word singularized, then PascalCased. */
export function tableMoniker(table: string): string {
  const match = /^(.*?)([A-Za-z]+)$/.exec(table);
  const singular = match ? match[1] + singularize(match[2]) : table;
  return pascalCase(singular);
}

/** Makes a column name usable as a class property. */
export function propertyName(name: string): string {
  const cleaned = name.replace(/[^\w$]/g, '_');
  return /^\d/.test(cleaned) ? `_${cleaned}` : cleaned;
}
