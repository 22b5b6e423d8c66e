import type {
  FileReadError,
  InvalidSignatureError,
  SignatureNotFoundError,
} from "../../core/errors.js";
import type { ReaderKind } from "../readers/types.js";
import type { Signature } from "../../storage/signatureStore.js";

export type InvalidReason = "mismatch" | "structure" | "no-extension";

export type ValidOutcome = {
  status: "valid";
  filePath: string;
  extension: string;
  reader: ReaderKind;
  matched: Signature;
};

export type InvalidOutcome = {
  status: "invalid";
  filePath: string;
  extension: string;
  reason: InvalidReason;
  message: string;
  /** Last compared pattern (mismatch only) */
  expected?: string;
  /** Leading bytes of the file as hex (mismatch only) */
  actual?: string;
};

export type FaultOutcome =
  | { status: "fault"; filePath: string; kind: "file-read"; error: FileReadError }
  | {
      status: "fault";
      filePath: string;
      kind: "signature-not-found";
      error: SignatureNotFoundError;
    }
  | {
      status: "fault";
      filePath: string;
      kind: "invalid-signature";
      error: InvalidSignatureError;
    };

export type ValidationOutcome = ValidOutcome | InvalidOutcome | FaultOutcome;

export type ScanEntry = {
  file: string;
  status: "valid" | "invalid" | "unknown" | "error";
  message?: string;
};

export interface ScanReport {
  directory: string;
  recursive: boolean;
  extensions: string[];
  dbPath: string;
  total: number;
  valid: number;
  invalid: number;
  errors: number;
  files: ScanEntry[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  pass: boolean;
}
