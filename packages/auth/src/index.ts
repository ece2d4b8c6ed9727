export {
  authFailureCodes,
  FORBIDDEN_MESSAGE,
  tokensMatch,
  validateBearerToken,
  type AuthFailureCode,
  type AuthResult
} from './bearer';
