/**
 * Run configuration types shared by the argument pipeline and the resolver.
 */

import type { FilterChain, TerminatedFilterChain } from '../filters/types.js';

export type OperationMode = 'compress' | 'decompress' | 'list' | 'test';

/** `lzma` is the legacy single-filter container. */
export type ContainerFormat = 'auto' | 'xz' | 'lzma' | 'raw';

/** Formats that can be picked as the default when compressing with `auto`. */
export type CompressFormat = 'xz' | 'lzma';

export type CheckKind = 'none' | 'crc32' | 'crc64' | 'sha256';

export enum Verbosity {
  Silent = 0,
  Error = 1,
  Warning = 2,
  Verbose = 3,
  Debug = 4,
}

export type RecordSeparator = '\n' | '\0';

export type FilesListSource =
  | { kind: 'stdin'; separator: RecordSeparator }
  | { kind: 'file'; path: string; fd: number; separator: RecordSeparator };

/** A --files/--files0 flag; the named source is opened once parsing succeeds */
export interface FilesListRequest {
  /** Standard input when absent */
  path?: string;
  separator: RecordSeparator;
}

export interface RunConfiguration {
  mode: OperationMode;
  format: ContainerFormat;
  suffix?: string;
  check: CheckKind;
  verbosity: Verbosity;
  stdout: boolean;
  force: boolean;
  keepOriginal: boolean;
  preserveName: boolean;
  /** Bytes */
  memoryBudget: number;
  threadsRequested: number;
  /** Set once the configuration is finalized */
  threadsEffective?: number;
  filesList?: FilesListSource;
}

export interface Preset {
  /** 1-9 */
  level: number;
  /** True while the user named neither a preset level nor a filter */
  isDefault: boolean;
}

/**
 * Everything the flag interpreter accumulates between passes.
 */
export interface ArgumentState {
  config: RunConfiguration;
  filters: FilterChain;
  preset: Preset;
  /** Format used when compressing with `--format=auto` */
  compressFormat: CompressFormat;
  filesList?: FilesListRequest;
}

export interface CompressionSettings {
  chain: TerminatedFilterChain;
  preset: Preset;
  /** Estimated peak memory of one coder instance, in bytes */
  memoryUsage: number;
  threadsEffective: number;
}

export interface ResolvedInvocation {
  config: RunConfiguration;
  /** Present when compressing or when the format is raw */
  compression?: CompressionSettings;
  files: string[];
}
