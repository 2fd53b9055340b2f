import { Printer } from "./Printer.ts";
import { BAD_FILE_NAME, BAD_FILE_NUMBER, FILE_ALREADY_OPEN, IOError, RuntimeError } from "./Errors.ts";

export enum OpenMode {
  INPUT,
  OUTPUT,
  APPEND,
  RANDOM,
}

export const MAX_FILES = 15;
export const DEFAULT_RECORD_LENGTH = 128;

export interface Opener {
  open(path: string, mode: OpenMode, recordLength?: number): Handle;
  close(handle: Handle): void;
}

export interface FileAccessor extends Printer {
  openMode(): OpenMode;

  readChars(numBytes: number): string;
  readLine(): string;

  // Records are addressed by byte offset.  Reads past the end of the file are
  // padded with spaces.
  readRecord(offset: number, length: number): number[];
  writeRecord(offset: number, bytes: number[]): void;

  length(): number;
  eof(): boolean;
  getLoc(): number;
}

export interface Handle {
  owner: Opener;
  path: string;
  accessor: FileAccessor;
}

export interface FieldDefinition {
  name: string;
  offset: number;
  width: number;
}

// A handle bound to a BASIC file number, with its random-access state.
export interface OpenFile {
  handle: Handle;
  mode: OpenMode;
  recordLength: number;
  fields: FieldDefinition[];
  buffer: number[];
  // The record the next GET or PUT without a record number uses.
  nextRecord: number;
}

export class Files {
  handles: Map<number, OpenFile> = new Map();

  open(opener: Opener, fileNumber: number, path: string, mode: OpenMode, recordLength?: number): OpenFile {
    if (path === '') {
      throw RuntimeError.fromError(BAD_FILE_NAME);
    }
    if (!Number.isInteger(fileNumber) || fileNumber < 1 || fileNumber > MAX_FILES) {
      throw RuntimeError.fromError(BAD_FILE_NUMBER);
    }
    if (this.handles.has(fileNumber)) {
      throw RuntimeError.fromError(FILE_ALREADY_OPEN);
    }
    const length = mode === OpenMode.RANDOM ? (recordLength ?? DEFAULT_RECORD_LENGTH) : 1;
    const handle = tryIo(() => opener.open(path, mode, length));
    const file: OpenFile = {
      handle,
      mode,
      recordLength: length,
      fields: [],
      buffer: new Array(length).fill(32),
      nextRecord: 1,
    };
    this.handles.set(fileNumber, file);
    return file;
  }

  get(fileNumber: number): OpenFile {
    const file = this.handles.get(fileNumber);
    if (!file) {
      throw RuntimeError.fromError(BAD_FILE_NUMBER);
    }
    return file;
  }

  close(fileNumber: number) {
    const file = this.handles.get(fileNumber);
    if (!file) {
      return;
    }
    this.handles.delete(fileNumber);
    tryIo(() => file.handle.owner.close(file.handle));
  }

  closeAll() {
    for (const fileNumber of [...this.handles.keys()]) {
      this.close(fileNumber);
    }
  }
}

export function tryIo<T>(fn: () => T): T {
  try {
    return fn();
  } catch (e: unknown) {
    if (e instanceof IOError) {
      throw RuntimeError.fromError(e.error);
    }
    throw e;
  }
}
