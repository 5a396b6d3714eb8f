/**
 * External service clients
 *
 * - CompletionClient: chat-completion API used to generate supportive replies
 */

export {
    CompletionClient,
    createCompletionClient,
    CompletionError,
    CompletionErrorCode,
    DEFAULT_COMPLETION_CONFIG,
    type ICompletionClient,
    type CompletionClientConfig,
} from './completionClient';
