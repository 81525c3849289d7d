import type { SymbolKind, SymbolRecord } from '@tagstream/shared';
import { FileTable, makeLocation } from '../src/location';
import { IndexSnapshot, SymbolIndex } from '../src/symbol_index';

export const MAIN = 1;
export const STDIO = 2;
export const UTIL = 3;

interface SymbolFields {
  symbolName: string;
  kind?: SymbolKind;
  kindSpelling?: string;
  displayName?: string;
  isDefinition?: boolean;
  range?: [number, number, number, number];
}

export function sym(fileId: number, line: number, column: number, fields: SymbolFields): SymbolRecord {
  const [startLine, startColumn, endLine, endColumn] = fields.range ?? [line, column, line, column + fields.symbolName.length];
  return {
    location: makeLocation(fileId, line, column),
    symbolName: fields.symbolName,
    displayName: fields.displayName ?? fields.symbolName,
    kind: fields.kind ?? 'reference',
    kindSpelling: fields.kindSpelling ?? 'DeclRefExpr',
    isDefinition: fields.isDefinition ?? false,
    startLine,
    startColumn,
    endLine,
    endColumn,
  };
}

export function buildFiles(): FileTable {
  const files = new FileTable();
  files.register('/src/app/main.cpp');
  files.register('/usr/include/stdio.h');
  files.register('/src/app/util.cpp');
  return files;
}

/**
 * main.cpp: class Widget (1-3), method Widget::run (10:1-20:2) with calls to
 * printf inside it, and references after it. stdio.h: one large function
 * definition. util.cpp: a single call at line 5.
 */
export function buildRecords(): SymbolRecord[] {
  return [
    sym(MAIN, 1, 7, { symbolName: 'Widget', kind: 'class', kindSpelling: 'ClassDecl', isDefinition: true, range: [1, 1, 3, 2] }),
    sym(MAIN, 10, 6, {
      symbolName: 'Widget::run',
      displayName: 'run()',
      kind: 'method',
      kindSpelling: 'CXXMethod',
      isDefinition: true,
      range: [10, 1, 20, 2],
    }),
    sym(MAIN, 12, 3, { symbolName: 'printf', kind: 'call', kindSpelling: 'CallExpr' }),
    sym(MAIN, 15, 5, { symbolName: 'printf', kind: 'call', kindSpelling: 'CallExpr' }),
    sym(MAIN, 20, 2, { symbolName: 'count' }),
    sym(MAIN, 20, 3, { symbolName: 'count' }),
    sym(MAIN, 25, 3, { symbolName: 'printf', kind: 'call', kindSpelling: 'CallExpr' }),
    sym(STDIO, 1, 5, {
      symbolName: 'bigFn',
      displayName: 'bigFn(int)',
      kind: 'function',
      kindSpelling: 'FunctionDecl',
      isDefinition: true,
      range: [1, 1, 100, 1],
    }),
    sym(UTIL, 5, 3, { symbolName: 'printf', kind: 'call', kindSpelling: 'CallExpr' }),
  ];
}

export function buildSnapshot(root?: string): IndexSnapshot {
  return { files: buildFiles(), symbols: SymbolIndex.fromRecords(buildRecords()), root };
}
