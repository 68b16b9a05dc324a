import { ArtifactResolver } from './collaborators.js';

function baseName(filePath: string): string {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? filePath;
}

export function singularize(word: string): string {
  if (word.endsWith('ies') && word.length > 3) {
    return `${word.slice(0, -3)}y`;
  }
  if (/(ss|x|z|ch|sh)es$/.test(word)) {
    return word.slice(0, -2);
  }
  if (word.endsWith('s') && !word.endsWith('ss')) {
    return word.slice(0, -1);
  }
  return word;
}

function normalizeKey(raw: string): string {
  return singularize(raw.replace(/[-_.]/g, '').toLowerCase());
}

/** `users-api.yaml` and `user_openapi.json` both resolve to `user`. */
export function specResourceKey(filePath: string): string {
  const stem = baseName(filePath).replace(/\.(ya?ml|json)$/i, '');
  return normalizeKey(stem.replace(/[-_.]?(openapi|swagger|api|spec)$/i, ''));
}

/** `UserController.java` and `UsersResource.java` both resolve to `user`. */
export function codeResourceKey(filePath: string): string {
  const stem = baseName(filePath).replace(/\.java$/i, '');
  return normalizeKey(stem.replace(/(Controller|Resource|Endpoint|Api)$/, ''));
}

/**
 * Pairs spec and code artifacts by the resource name embedded in their file
 * names. Candidates are considered in sorted order so pairing is stable.
 */
export class NameMatchingResolver implements ArtifactResolver {
  relatedCodeArtifacts(specArtifact: string, candidates: readonly string[]): string[] {
    const key = specResourceKey(specArtifact);
    if (key.length === 0) {
      return [];
    }
    return [...candidates].sort().filter((candidate) => codeResourceKey(candidate) === key);
  }
}
