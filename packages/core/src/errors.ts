/**
 * Error Types
 *
 * Recoverable failures are returned as plain `FsError` values and narrowed
 * with `isFsError`. Storage backend failures are not wrapped: they reject.
 */

export type FsErrorCode = "NOT_A_DIRECTORY" | "NOT_A_FILE" | "NOT_FOUND" | "DECODE_ERROR";

export type FsError = {
  code: FsErrorCode;
  status: number;
  message: string;
  details?: Record<string, unknown>;
};

const FS_ERROR_CODES: ReadonlySet<string> = new Set<FsErrorCode>([
  "NOT_A_DIRECTORY",
  "NOT_A_FILE",
  "NOT_FOUND",
  "DECODE_ERROR",
]);

/** Type guard for FsError */
export function isFsError(value: unknown): value is FsError {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string" &&
    FS_ERROR_CODES.has(value.code) &&
    "status" in value &&
    "message" in value
  );
}

/** Convenience constructor for FsError */
export function fsError(
  code: FsErrorCode,
  status: number,
  message: string,
  details?: Record<string, unknown>
): FsError {
  return details === undefined ? { code, status, message } : { code, status, message, details };
}

export const notADirectory = (): FsError =>
  fsError("NOT_A_DIRECTORY", 400, "Node is a file, not a directory");

export const notAFile = (): FsError =>
  fsError("NOT_A_FILE", 400, "Node is a directory, not a file");

export const notFound = (cid: string): FsError =>
  fsError("NOT_FOUND", 404, `Block not found: ${cid}`, { cid });

export const decodeError = (cid: string, reason: string, details?: Record<string, unknown>) =>
  fsError("DECODE_ERROR", 422, `Block ${cid} could not be decoded: ${reason}`, {
    cid,
    ...details,
  });
