export type SystemPathClassifier = (normalizedPath: string) => boolean;

export const DEFAULT_SYSTEM_PREFIXES = ['/usr/', '/System/'];
export const DEFAULT_SYSTEM_EXCEPTIONS = ['/usr/home/'];

export function createSystemPathClassifier(
  prefixes: readonly string[] = DEFAULT_SYSTEM_PREFIXES,
  exceptions: readonly string[] = DEFAULT_SYSTEM_EXCEPTIONS,
): SystemPathClassifier {
  return p => prefixes.some(pre => p.startsWith(pre)) && !exceptions.some(ex => p.startsWith(ex));
}

export const isSystemPath = createSystemPathClassifier();
