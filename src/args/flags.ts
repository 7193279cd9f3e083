/**
 * Command-line flag table
 *
 * One entry per spelling. Aliases kept for compatibility with older tools
 * are hidden from the help text but behave exactly like the primary flag.
 */

import type { FilterId } from '../filters/types.js';

export type ScalarAction =
  | 'memory'
  | 'name'
  | 'no-name'
  | 'suffix'
  | 'threads'
  | 'version'
  | 'help'
  | 'stdout'
  | 'decompress'
  | 'force'
  | 'list'
  | 'keep'
  | 'quiet'
  | 'test'
  | 'verbose'
  | 'compress'
  | 'format'
  | 'check'
  | 'files'
  | 'files0';

export type FlagAction =
  | { type: 'preset'; level: number }
  | { type: 'filter'; filter: FilterId }
  | { type: ScalarAction };

export interface FlagDefinition {
  /** Commander flag syntax, e.g. '-M, --memory <limit>' */
  flags: string;
  description: string;
  action: FlagAction;
  hidden?: boolean;
}

function presetFlag(level: number): FlagDefinition {
  return {
    flags: `-${level}`,
    description: `compression preset ${level}`,
    action: { type: 'preset', level },
    hidden: true,
  };
}

export const FLAG_DEFINITIONS: readonly FlagDefinition[] = [
  // Operation mode
  { flags: '-z, --compress', description: 'force compression', action: { type: 'compress' } },
  { flags: '-d, --decompress', description: 'force decompression', action: { type: 'decompress' } },
  {
    flags: '--uncompress',
    description: 'force decompression',
    action: { type: 'decompress' },
    hidden: true,
  },
  { flags: '-t, --test', description: 'test compressed file integrity', action: { type: 'test' } },
  { flags: '-l, --list', description: 'list information about files', action: { type: 'list' } },
  {
    flags: '--info',
    description: 'list information about files',
    action: { type: 'list' },
    hidden: true,
  },

  // Operation modifiers
  {
    flags: '-k, --keep',
    description: "keep (don't delete) input files",
    action: { type: 'keep' },
  },
  {
    flags: '-f, --force',
    description: 'force overwrite of output file',
    action: { type: 'force' },
  },
  {
    flags: '-c, --stdout',
    description: "write to standard output and don't delete input files",
    action: { type: 'stdout' },
  },
  {
    flags: '--to-stdout',
    description: 'write to standard output',
    action: { type: 'stdout' },
    hidden: true,
  },
  {
    flags: '-S, --suffix <suffix>',
    description: 'use suffix on compressed files',
    action: { type: 'suffix' },
  },
  {
    flags: '-N, --name',
    description: 'save or restore the original filename',
    action: { type: 'name' },
  },
  {
    flags: '-n, --no-name',
    description: 'do not save or restore the original filename',
    action: { type: 'no-name' },
  },
  {
    flags: '--files [file]',
    description: 'read filenames to process from file (newline separated)',
    action: { type: 'files' },
  },
  {
    flags: '--files0 [file]',
    description: 'like --files but use the null character as terminator',
    action: { type: 'files0' },
  },

  // Compression settings
  {
    flags: '-F, --format <format>',
    description: 'file format to encode or decode: auto, xz, lzma, alone, raw',
    action: { type: 'format' },
  },
  {
    flags: '-C, --check <check>',
    description: 'integrity check type: none, crc32, crc64, sha256',
    action: { type: 'check' },
  },
  {
    flags: '-1, --fast',
    description: 'fastest compression (preset 1)',
    action: { type: 'preset', level: 1 },
  },
  presetFlag(2),
  presetFlag(3),
  presetFlag(4),
  presetFlag(5),
  presetFlag(6),
  presetFlag(7),
  presetFlag(8),
  {
    flags: '-9, --best',
    description: 'best compression (preset 9)',
    action: { type: 'preset', level: 9 },
  },
  {
    flags: '-M, --memory <limit>',
    description: 'set memory usage limit in bytes',
    action: { type: 'memory' },
  },
  {
    flags: '-T, --threads <count>',
    description: 'use at most this many threads',
    action: { type: 'threads' },
  },

  // Custom filter chain
  {
    flags: '--lzma1 [options]',
    description: 'LZMA1 filter',
    action: { type: 'filter', filter: 'lzma1' },
  },
  {
    flags: '--lzma2 [options]',
    description: 'LZMA2 filter',
    action: { type: 'filter', filter: 'lzma2' },
  },
  {
    flags: '--x86',
    description: 'x86 branch/call/jump converter',
    action: { type: 'filter', filter: 'x86' },
  },
  {
    flags: '--bcj',
    description: 'x86 branch/call/jump converter',
    action: { type: 'filter', filter: 'x86' },
    hidden: true,
  },
  {
    flags: '--powerpc',
    description: 'PowerPC branch converter',
    action: { type: 'filter', filter: 'powerpc' },
  },
  {
    flags: '--ppc',
    description: 'PowerPC branch converter',
    action: { type: 'filter', filter: 'powerpc' },
    hidden: true,
  },
  {
    flags: '--ia64',
    description: 'IA-64 branch converter',
    action: { type: 'filter', filter: 'ia64' },
  },
  {
    flags: '--itanium',
    description: 'IA-64 branch converter',
    action: { type: 'filter', filter: 'ia64' },
    hidden: true,
  },
  {
    flags: '--arm',
    description: 'ARM branch converter',
    action: { type: 'filter', filter: 'arm' },
  },
  {
    flags: '--armthumb',
    description: 'ARM-Thumb branch converter',
    action: { type: 'filter', filter: 'armthumb' },
  },
  {
    flags: '--sparc',
    description: 'SPARC branch converter',
    action: { type: 'filter', filter: 'sparc' },
  },
  {
    flags: '--delta [options]',
    description: 'delta filter (dist=1-256)',
    action: { type: 'filter', filter: 'delta' },
  },
  {
    flags: '--subblock [options]',
    description: 'subblock filter (size, rle, align)',
    action: { type: 'filter', filter: 'subblock' },
  },

  // Other
  {
    flags: '-q, --quiet',
    description: 'suppress warnings; specify twice to suppress errors too',
    action: { type: 'quiet' },
  },
  {
    flags: '-v, --verbose',
    description: 'be verbose; specify twice for even more verbose',
    action: { type: 'verbose' },
  },
  { flags: '-h, --help', description: 'display this help and exit', action: { type: 'help' } },
  { flags: '-V, --version', description: 'display version and exit', action: { type: 'version' } },
];

/**
 * Long flags whose value is optional. Such a value is only taken when
 * attached with '='; a following word stays a filename.
 */
export const OPTIONAL_VALUE_FLAGS: ReadonlySet<string> = new Set(
  FLAG_DEFINITIONS.filter((definition) => definition.flags.endsWith(']')).map(
    (definition) => definition.flags.split(' ')[0]
  )
);

/**
 * Spellings whose value is always the next argument when not attached.
 */
export const REQUIRED_VALUE_FLAGS: ReadonlySet<string> = new Set(
  FLAG_DEFINITIONS.filter((definition) => definition.flags.endsWith('>')).flatMap((definition) =>
    definition.flags.split(/[ ,]+/).filter((part) => part.startsWith('-'))
  )
);
