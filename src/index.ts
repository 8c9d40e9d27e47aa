export { YoutuClient, DEFAULT_HOST, type YoutuClientOptions } from './modules/face/face.service';
export { faceOperations, emptyFace, type YoutuOperation, type WireBody } from './modules/face/face.operations';
export * from './modules/face/face.types';
export { Credential } from './modules/signature/signature.credential';
export { USER_ID_MAX_LENGTH, type CredentialInput } from './modules/signature/signature.validation';
export {
  buildCanonicalString,
  buildToken,
  signCanonicalString,
  systemSignatureSource,
  type SignatureParams,
  type SignatureSource,
} from './modules/signature/signature.service';
export { buildInterfaceUrl, postSignedJson, DEFAULT_TIMEOUT_MS } from './infrastructure/youtu/youtu-json-client';
export {
  AppError,
  DecodingError,
  EncodingError,
  IOError,
  NetworkError,
  ValidationError,
  type AppErrorCode,
} from './common/errors/app-error';
export { encodeImage, encodeImageBuffer, extractBase64Payload } from './common/utils/base64';
export { loadConfig, createClientFromConfig, createClientFromEnv, type YoutuConfig } from './config';
