/**
 * Base error class for bytewarden errors
 */
export class BytewardenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BytewardenError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a file's magic bytes or internal structure do not confirm its
 * extension. This is an expected negative result, not a system fault.
 */
export class ValidationError extends BytewardenError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Thrown when the candidate file is missing, too large or cannot be read
 */
export class FileReadError extends BytewardenError {
  public readonly filePath: string | undefined;

  constructor(message: string, filePath?: string) {
    super(message);
    this.name = "FileReadError";
    this.filePath = filePath;
  }
}

/**
 * Thrown when the store has no signature for an extension
 */
export class SignatureNotFoundError extends BytewardenError {
  public readonly extension: string;

  constructor(extension: string) {
    super(`No signature found for extension '.${extension}'`);
    this.name = "SignatureNotFoundError";
    this.extension = extension;
  }
}

/**
 * Thrown when a stored pattern is not valid hex (store corruption)
 */
export class InvalidSignatureError extends BytewardenError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSignatureError";
  }
}

export class DatabaseError extends BytewardenError {
  constructor(message: string) {
    super(message);
    this.name = "DatabaseError";
  }
}

/**
 * Thrown when a signature registration carries an empty extension, an empty
 * pattern or a pattern that is not hex
 */
export class InvalidInputError extends DatabaseError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class DuplicateSignatureError extends DatabaseError {
  public readonly extension: string;
  public readonly magicBytes: string;
  public readonly offset: number;

  constructor(extension: string, magicBytes: string, offset: number) {
    super(
      `Signature for '.${extension}' with magic bytes ${magicBytes} at offset ${offset} already exists`
    );
    this.name = "DuplicateSignatureError";
    this.extension = extension;
    this.magicBytes = magicBytes;
    this.offset = offset;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
