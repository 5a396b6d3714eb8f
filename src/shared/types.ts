/**
 * Shared type definitions for the Support Journal
 *
 * Organized by domain:
 * - Users: accounts and the identity attached to a request
 * - Entries: journal submissions with their generated replies
 * - Completion: chat-style messages sent to the completion service
 * - Web: validation results, flash messages, API responses
 */

// ============================================================================
// User Types
// ============================================================================

/**
 * A registered account.
 * The raw password is never stored, only its bcrypt hash.
 */
export interface User {
    id: string;
    username: string;
    passwordHash: string;
    createdAt: Date;
}

/**
 * The identity attached to an authenticated request.
 * Never carries the password hash; views receive this shape.
 */
export interface AuthenticatedUser {
    id: string;
    username: string;
}

// ============================================================================
// Entry Types
// ============================================================================

/**
 * One submitted struggle description plus the supportive reply generated for it.
 */
export interface Entry {
    id: string;
    userId: string;
    category: string;
    description: string;
    response: string;
    createdAt: Date;
}

/**
 * Input for creating an entry. The id and timestamp are assigned by the store.
 */
export interface NewEntry {
    userId: string;
    category: string;
    description: string;
    response: string;
}

// ============================================================================
// Completion Types
// ============================================================================

export type CompletionRole = 'system' | 'user' | 'assistant';

/**
 * A single message in a chat-style completion request.
 */
export interface CompletionMessage {
    role: CompletionRole;
    content: string;
}

/**
 * Per-call overrides for text generation.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// Web Types
// ============================================================================

/**
 * Result of form validation.
 * `error` holds the user-facing message when `valid` is false.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export type FlashCategory = 'error' | 'success';

/**
 * A one-shot message shown on the next rendered page.
 */
export interface FlashMessage {
    category: FlashCategory;
    message: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    database: boolean;
}
