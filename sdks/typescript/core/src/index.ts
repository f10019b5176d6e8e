/**
 * @bitforge/core
 *
 * Error taxonomy and result types shared by the bitforge TypeScript packages.
 */

export {
  CodecError,
  CodecErrorCodes,
  type CodecErrorCode,
  type CodecErrorDetails,
  getCodecErrorName,
  isCodecError,
} from './CodecError.js';

export { CodecResult, tryCodec } from './CodecResult.js';
