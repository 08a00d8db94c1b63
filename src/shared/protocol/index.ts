export {
  MAX_NAME_LENGTH,
  ChallengeRequestSchema,
  ChallengeSchema,
  ChallengeResponseSchema,
  ChallengeStateSchema,
  KeyLookupSchema,
  ErrorBodySchema,
  type ChallengeRequest,
  type Challenge,
  type ChallengeResponse,
  type ChallengeState,
  type KeyLookup,
  type ErrorBody,
} from './messages.js';

export {
  CHALLENGE_NONCE_LENGTH,
  type VerifyOptions,
  issueChallenge,
  verifyResponse,
  answerChallenge,
} from './challenge.js';
