export { MAGIC, VERSION, ELEMENT_CODES, encodeElement, decodeElement, isElementCode } from "./format";
export {
  encodeBundle,
  decodeBundle,
  decodeBundleBytes,
  openBundle,
  saveBundle,
  getField,
  type Bundle,
  type BundleField,
  type BundleFieldInput,
  type BundleReadOptions,
  type OpenedBundle,
} from "./serialize";
export {
  BundleTooShortError,
  BundleBadMagicError,
  BundleUnsupportedVersionError,
  BundleCorruptFieldError,
} from "./errors";
