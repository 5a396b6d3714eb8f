/**
 * Backend services
 *
 * Core business logic components:
 * - validation: form checks and their user-facing messages
 * - passwords: bcrypt hashing and verification
 * - sessionTokens: signed identity tokens
 * - redirects: same-origin check for the login `next` parameter
 * - SupportReplyService: prompt building and fallback around the completion client
 */

export {
    validateRegistration,
    validateCredentials,
    validateEntryInput,
    characterLength,
    isPresent,
    MIN_USERNAME_LENGTH,
    MIN_PASSWORD_LENGTH,
    MAX_CATEGORY_LENGTH,
    MAX_DESCRIPTION_LENGTH,
    REGISTRATION_MESSAGES,
    INVALID_CREDENTIALS_MESSAGE,
    ENTRY_MESSAGES,
} from './validation';

export { hashPassword, verifyPassword, DEFAULT_BCRYPT_ROUNDS } from './passwords';

export { signSessionToken, verifySessionToken } from './sessionTokens';

export type { SessionTokenOptions } from './sessionTokens';

export { isSafeRedirectTarget } from './redirects';

export {
    SupportReplyService,
    createSupportReplyService,
    buildSupportPrompt,
    buildSupportMessages,
    SUPPORT_SYSTEM_PROMPT,
    FALLBACK_REPLY,
} from './supportReply';

export type { ISupportReplyService } from './supportReply';
