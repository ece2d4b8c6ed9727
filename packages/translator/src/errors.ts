export const translatorErrorCodes = ['invalid_header_name', 'invalid_header_value', 'request_url_invalid'] as const;

export type TranslatorErrorCode = (typeof translatorErrorCodes)[number];

export type TranslatorError = {
  code: TranslatorErrorCode;
  message: string;
};

export type TranslatorSuccess<T> = {ok: true; value: T};
export type TranslatorFailure = {ok: false; error: TranslatorError};
export type TranslatorResult<T> = TranslatorSuccess<T> | TranslatorFailure;

export const ok = <T>(value: T): TranslatorSuccess<T> => ({ok: true, value});

export const err = (code: TranslatorErrorCode, message: string): TranslatorFailure => ({
  ok: false,
  error: {code, message}
});
