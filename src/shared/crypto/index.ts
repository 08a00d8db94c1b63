export {
  PUBLIC_KEY_LENGTH,
  PUBLIC_KEY_FILE,
  PRIVATE_KEY_FILE,
  type Identity,
  type SerializedIdentity,
  generateIdentity,
  exportPublicKey,
  importPublicKey,
  publicKeyToHex,
  publicKeyFromHex,
  serializeIdentity,
  deserializeIdentity,
  saveIdentity,
  identityExists,
  loadIdentity,
  loadPublicKey,
  fingerprint,
} from './keys.js';

export { SEALED_OVERHEAD, sealTo, openSealed } from './sealed-box.js';

export {
  STATE_KEY_LENGTH,
  STATE_NONCE_LENGTH,
  type SealedState,
  generateStateKey,
  parseStateKey,
  sealState,
  openState,
} from './state-key.js';
