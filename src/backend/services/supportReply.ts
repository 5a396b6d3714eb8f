/**
 * Support Reply Service
 *
 * Turns an entry's category and description into a supportive reply.
 * The prompt and the system instruction are fixed. Any failure of the
 * completion call is logged and replaced by FALLBACK_REPLY, so callers
 * always get text back and never see an error. There is no retry.
 */

import { CompletionMessage } from '../../shared/types';
import { ICompletionClient } from '../clients/completionClient';

export const SUPPORT_SYSTEM_PROMPT =
    'You are a compassionate addiction support assistant. ' +
    'Respond in a calm, supportive, and empathetic tone. ' +
    'Avoid giving medical advice. Always suggest professional help if needed.';

export const FALLBACK_REPLY =
    "I'm sorry, I'm having trouble responding right now. Please reach out to a professional.";

/**
 * Builds the user message sent to the completion service.
 */
export function buildSupportPrompt(category: string, description: string): string {
    return `I am struggling with ${category}. Here's what I'm going through: ${description}`;
}

/**
 * Builds the full message list: the system instruction followed by the prompt.
 */
export function buildSupportMessages(category: string, description: string): CompletionMessage[] {
    return [
        { role: 'system', content: SUPPORT_SYSTEM_PROMPT },
        { role: 'user', content: buildSupportPrompt(category, description) },
    ];
}

export interface ISupportReplyService {
    getReply(category: string, description: string): Promise<string>;
}

export class SupportReplyService implements ISupportReplyService {
    constructor(
        private readonly completionClient: ICompletionClient,
        private readonly fallbackReply: string = FALLBACK_REPLY
    ) {}

    /**
     * @returns The generated reply, or the fallback reply if generation failed
     */
    async getReply(category: string, description: string): Promise<string> {
        try {
            return await this.completionClient.generateChatCompletion(
                buildSupportMessages(category, description)
            );
        } catch (error) {
            console.error('Completion service error:', error);
            return this.fallbackReply;
        }
    }
}

export function createSupportReplyService(
    completionClient: ICompletionClient,
    fallbackReply?: string
): SupportReplyService {
    return new SupportReplyService(completionClient, fallbackReply);
}
