export {
  MetablockError,
  EncodingError,
  SchemaValidationError,
  IllegalArgumentError,
  VerificationFailureError,
  SignatureVerificationError,
  KeyFormatError
} from './errors';
