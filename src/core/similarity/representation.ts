import { keySet, buildNGramTable } from '../ngram/table';
import { tokenizeInstructions } from '../tokenize/instructions';
import type { NGramTable, TokenSequence } from '../types';

/**
 * What a metric sees of one corpus entry: its instruction sequence and,
 * per n, its n-gram table and key set. Implementations cache per n.
 */
export interface Representation {
  tokens(): TokenSequence;
  table(n: number): NGramTable;
  keys(n: number): ReadonlySet<string>;
}

abstract class CachedRepresentation implements Representation {
  private readonly tables = new Map<number, NGramTable>();
  private readonly keySets = new Map<number, ReadonlySet<string>>();

  abstract tokens(): TokenSequence;

  protected abstract computeTable(n: number): NGramTable;

  table(n: number): NGramTable {
    let table = this.tables.get(n);
    if (!table) {
      table = this.computeTable(n);
      this.tables.set(n, table);
    }
    return table;
  }

  keys(n: number): ReadonlySet<string> {
    let keys = this.keySets.get(n);
    if (!keys) {
      keys = keySet(this.table(n));
      this.keySets.set(n, keys);
    }
    return keys;
  }
}

/** Tables derived from an in-memory token sequence. */
export class TokenRepresentation extends CachedRepresentation {
  constructor(private readonly sequence: TokenSequence) {
    super();
  }

  static fromWatText(watText: string): TokenRepresentation {
    return new TokenRepresentation(tokenizeInstructions(watText));
  }

  tokens(): TokenSequence {
    return this.sequence;
  }

  protected computeTable(n: number): NGramTable {
    return buildNGramTable(this.sequence, n);
  }
}

/** Tables read through a loader (precomputed files); tokens loaded lazily for sequence metrics. */
export class LoadedRepresentation extends CachedRepresentation {
  private sequence: TokenSequence | undefined;

  constructor(
    private readonly loadTokens: () => TokenSequence,
    private readonly loadTable: (n: number) => NGramTable,
  ) {
    super();
  }

  tokens(): TokenSequence {
    if (!this.sequence) this.sequence = this.loadTokens();
    return this.sequence;
  }

  protected computeTable(n: number): NGramTable {
    return this.loadTable(n);
  }
}
