export const processorErrorCodes = [
  'request_body_invalid',
  'request_translation_failed',
  'upstream_request_failed',
  'dispatch_target_invalid',
  'target_region_mismatch'
] as const;

export type ProcessorErrorCode = (typeof processorErrorCodes)[number];

export type ProcessorError = {
  code: ProcessorErrorCode;
  status: number;
  message: string;
};

export type ProcessorSuccess<T> = {ok: true; value: T};
export type ProcessorFailure = {ok: false; error: ProcessorError};
export type ProcessorResult<T> = ProcessorSuccess<T> | ProcessorFailure;

export const ok = <T>(value: T): ProcessorSuccess<T> => ({ok: true, value});

export const err = (code: ProcessorErrorCode, status: number, message: string): ProcessorFailure => ({
  ok: false,
  error: {code, status, message}
});
