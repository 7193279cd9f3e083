/**
 * Filter chain model.
 *
 * A filter entry is a tagged variant: the id selects the shape of the
 * options record, and the branch/call/jump converters carry none.
 */

export type LzmaFilterId = 'lzma1' | 'lzma2';

export type SimpleFilterId = 'x86' | 'powerpc' | 'ia64' | 'arm' | 'armthumb' | 'sparc';

export type FilterId = LzmaFilterId | SimpleFilterId | 'delta' | 'subblock';

export type LzmaMode = 'fast' | 'normal';

export type MatchFinder = 'hc3' | 'hc4' | 'bt2' | 'bt3' | 'bt4';

export interface LzmaOptions {
  dictSize: number;
  /** Literal context bits */
  lc: number;
  /** Literal position bits */
  lp: number;
  /** Position bits */
  pb: number;
  mode: LzmaMode;
  niceLen: number;
  matchFinder: MatchFinder;
  /** Match finder search depth, 0 = automatic */
  depth: number;
}

export interface DeltaOptions {
  type: 'byte';
  distance: number;
}

export interface SubblockOptions {
  subblockDataSize: number;
  /** 0 disables run-length encoding */
  rle: number;
  alignment: number;
}

export type FilterEntry =
  | { id: LzmaFilterId; options: LzmaOptions }
  | { id: 'delta'; options: DeltaOptions }
  | { id: 'subblock'; options: SubblockOptions }
  | { id: SimpleFilterId };

export type FilterChain = readonly FilterEntry[];

/** The "unknown / end of chain" sentinel id. */
export const CHAIN_TERMINATOR = 'end' as const;

export interface TerminatedFilterChain {
  entries: FilterChain;
  terminator: typeof CHAIN_TERMINATOR;
}
