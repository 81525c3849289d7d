import { QueryJob } from './query_job';

/** Distinct symbol names starting with the query, from files the filters accept. */
export class ListSymbolsJob extends QueryJob {
  protected execute(): number {
    const names = new Set<string>();
    const accepted = new Map<number, boolean>();
    for (const rec of this.snapshot.symbols) {
      if (!rec.symbolName.startsWith(this.query.query)) continue;
      const { fileId } = rec.location;
      let ok = accepted.get(fileId);
      if (ok === undefined) {
        ok = this.filter(this.snapshot.files.pathOf(fileId) ?? '');
        accepted.set(fileId, ok);
      }
      if (ok) names.add(rec.symbolName);
    }
    for (const name of Array.from(names).sort()) {
      if (!this.write(name, { unfiltered: true })) break;
    }
    return names.size ? 0 : 1;
  }
}
