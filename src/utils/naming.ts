/**
 * Identifier and naming helpers shared by the namer and the renderers
 */

const WORD_SEPARATOR = /[^\p{L}\p{N}]+/u;

const IRREGULAR_SINGULARS: Record<string, string> = {
  people: "person",
  children: "child",
  men: "man",
  women: "woman",
  mice: "mouse",
  geese: "goose",
  feet: "foot",
  teeth: "tooth",
};

// Words ending in "s" that are already singular
const SINGULAR_S_ENDINGS = ["ss", "us", "is", "os"];

/**
 * Convert a string to PascalCase, keeping existing camel humps
 *
 * @example
 * toPascalCase("first-name") // "FirstName"
 * toPascalCase("userAccount") // "UserAccount"
 */
export function toPascalCase(input: string): string {
  return input
    .split(WORD_SEPARATOR)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

/**
 * Convert a string to snake_case
 *
 * @example
 * toSnakeCase("userID") // "user_id"
 * toSnakeCase("HTTPServer") // "http_server"
 */
export function toSnakeCase(input: string): string {
  return input
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, "$1_$2")
    .replace(/(\p{Lu}+)(\p{Lu}\p{Ll})/gu, "$1_$2")
    .replace(/[^\p{L}\p{N}]+/gu, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

/**
 * Best-effort English singular of the last word in `word`
 *
 * @example
 * singularize("users") // "user"
 * singularize("categories") // "category"
 * singularize("status") // "status"
 */
export function singularize(word: string): string {
  const lower = word.toLowerCase();
  const irregular = IRREGULAR_SINGULARS[lower];
  if (irregular !== undefined) {
    return word.charAt(0) === word.charAt(0).toUpperCase()
      ? irregular.charAt(0).toUpperCase() + irregular.slice(1)
      : irregular;
  }

  if (lower.length > 4 && lower.endsWith("ies")) {
    return word.slice(0, -3) + "y";
  }
  if (/(sses|xes|ches|shes|zzes)$/.test(lower)) {
    return word.slice(0, -2);
  }
  if (
    lower.length > 1 &&
    lower.endsWith("s") &&
    !SINGULAR_S_ENDINGS.some((ending) => lower.endsWith(ending))
  ) {
    return word.slice(0, -1);
  }
  return word;
}

/**
 * Type name derived from a field name, or `fallback` when nothing usable remains
 */
export function typeNameFrom(raw: string, fallback: string): string {
  const pascal = toPascalCase(raw);
  if (pascal.length === 0) {
    return fallback;
  }
  return /^\p{N}/u.test(pascal) ? `${fallback}${pascal}` : pascal;
}

/**
 * Type name for the element of a collection stored under `raw`
 */
export function elementNameFrom(raw: string, fallback: string): string {
  return typeNameFrom(singularize(raw), fallback);
}

const PLAIN_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isPlainIdentifier(name: string): boolean {
  return PLAIN_IDENTIFIER.test(name);
}
