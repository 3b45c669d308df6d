export {
  dedupeDeclaredFixities,
  normalizeAlgorithmName,
  validateFixities,
  validateFixitySyntax,
  verifyFileFixity,
  type VerifyOptions,
} from './validator.js';
