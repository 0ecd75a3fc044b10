import type { AppError } from './errors';

export const METADATA_START = 'CHIP-WARDEN-START';
export const METADATA_END = 'CHIP-WARDEN-END';

/** Fields the post processor must always emit. */
export const REQUIRED_METADATA_KEYS = ['project', 'part', 'posted'] as const;

export type ProgramMetadata = {
  readonly project: string;
  readonly part: string;
  /** `YYYY-MM-DD-HHMM` as written by the post processor; kept verbatim. */
  readonly postedTimestamp: string;
  readonly operations: number;
  readonly toolCount: number;
  readonly machine: string;
  readonly setup: string;
  readonly programNumber?: string;
};

export type MetadataErrorCode = 'metadata.missingFields' | 'metadata.invalidNumber' | 'metadata.unsafeName';

export type MetadataError = AppError & { code: MetadataErrorCode };

export type ComparedField = 'toolCount' | 'operations' | 'machine' | 'setup';

export type FieldChange<T> = { old: T; new: T };

export type MetadataChanges = {
  toolCount?: FieldChange<number>;
  operations?: FieldChange<number>;
  machine?: FieldChange<string>;
  setup?: FieldChange<string>;
};

export type WarningSeverity = 'high' | 'info';

export type ChangeWarning = {
  field: ComparedField;
  severity: WarningSeverity;
  message: string;
};

export type ChangeReport = {
  hasChanges: boolean;
  changes: MetadataChanges;
  warnings: ChangeWarning[];
};
