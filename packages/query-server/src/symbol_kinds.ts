import type { SymbolKind } from '@tagstream/shared';

const CONTAINER_KINDS: ReadonlySet<SymbolKind> = new Set<SymbolKind>([
  'function',
  'method',
  'constructor',
  'destructor',
  'class',
  'struct',
  'namespace',
  'lambda',
]);

export const SYMBOL_KINDS: readonly SymbolKind[] = [
  'function', 'method', 'constructor', 'destructor', 'class', 'struct', 'namespace', 'lambda',
  'variable', 'field', 'parameter', 'enum', 'enumConstant', 'typedef', 'macro', 'call', 'reference', 'unknown',
];

/** Kinds whose definitions can enclose other symbols. */
export function isContainerKind(kind: SymbolKind): boolean {
  return CONTAINER_KINDS.has(kind);
}

export function toSymbolKind(value: string): SymbolKind {
  const found = SYMBOL_KINDS.find(k => k === value);
  return found ?? 'unknown';
}
