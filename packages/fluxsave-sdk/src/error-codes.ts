/**
 * Machine-readable codes attached to every Fluxsave API error.
 *
 * | Code                     | Status | Meaning                                   |
 * |--------------------------|--------|-------------------------------------------|
 * | FILE_TOO_LARGE           | 413    | File exceeds the plan's max file size     |
 * | STORAGE_LIMIT            | 413    | Total storage quota exceeded              |
 * | FILE_COUNT_LIMIT         | 403    | Plan's max file count reached             |
 * | MIME_TYPE_NOT_ALLOWED    | 415    | File type blocked by plan                 |
 * | COMPRESSION_NOT_ALLOWED  | 403    | Compression level not permitted by plan   |
 * | SUBSCRIPTION_INACTIVE    | 402    | Subscription is not active                |
 * | FOLDER_COUNT_LIMIT       | 403    | Plan's max folder count reached           |
 * | EMAIL_ALREADY_REGISTERED | 400    | Duplicate email on register               |
 * | EMAIL_NOT_VERIFIED       | 403    | Login before verifying email              |
 * | INVALID_CREDENTIALS      | 400    | Wrong email or password                   |
 * | INVALID_OTP              | 400    | Bad or expired verification code          |
 * | UNAUTHORIZED             | 401    | Missing or rejected API key/secret        |
 * | NOT_FOUND                | 404    | File or folder does not exist             |
 * | UNKNOWN                  | any    | Anything else                             |
 */
export const FLUXSAVE_ERROR_CODES = [
  'FILE_TOO_LARGE',
  'STORAGE_LIMIT',
  'FILE_COUNT_LIMIT',
  'MIME_TYPE_NOT_ALLOWED',
  'COMPRESSION_NOT_ALLOWED',
  'SUBSCRIPTION_INACTIVE',
  'FOLDER_COUNT_LIMIT',
  'EMAIL_ALREADY_REGISTERED',
  'EMAIL_NOT_VERIFIED',
  'INVALID_CREDENTIALS',
  'INVALID_OTP',
  'UNAUTHORIZED',
  'NOT_FOUND',
  'UNKNOWN',
] as const;

export type FluxsaveErrorCode = (typeof FLUXSAVE_ERROR_CODES)[number];

export function isFluxsaveErrorCode(value: unknown): value is FluxsaveErrorCode {
  return FLUXSAVE_ERROR_CODES.some((code) => code === value);
}

/**
 * Classify a failed response by status and message.
 *
 * Messages are matched case-insensitively by substring, first rule wins, so a
 * 403 mentioning both "compression" and "folder" is COMPRESSION_NOT_ALLOWED.
 */
export function resolveErrorCode(status: number, message: string): FluxsaveErrorCode {
  const m = message.toLowerCase();

  switch (status) {
    case 413:
      return m.includes('storage limit') ? 'STORAGE_LIMIT' : 'FILE_TOO_LARGE';
    case 415:
      return 'MIME_TYPE_NOT_ALLOWED';
    case 402:
      return 'SUBSCRIPTION_INACTIVE';
    case 403:
      if (m.includes('compression')) return 'COMPRESSION_NOT_ALLOWED';
      if (m.includes('folder')) return 'FOLDER_COUNT_LIMIT';
      if (m.includes('file') || m.includes('maximum')) return 'FILE_COUNT_LIMIT';
      if (m.includes('email')) return 'EMAIL_NOT_VERIFIED';
      return 'UNKNOWN';
    case 400:
      if (m.includes('already registered')) return 'EMAIL_ALREADY_REGISTERED';
      if (m.includes('invalid email or password') || m.includes('invalid credentials')) {
        return 'INVALID_CREDENTIALS';
      }
      if (m.includes('otp')) return 'INVALID_OTP';
      return 'UNKNOWN';
    case 401:
      return 'UNAUTHORIZED';
    case 404:
      return 'NOT_FOUND';
    default:
      return 'UNKNOWN';
  }
}
