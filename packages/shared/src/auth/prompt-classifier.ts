import type { ChallengeKind } from '../types/session.interface.js';

export interface PromptClassification {
    kind: ChallengeKind;
    hint?: string;
}

// Masked addresses as providers print them, e.g. te***@g***.com
const MASKED_EMAIL_PATTERN = /[a-zA-Z0-9*]+@[a-zA-Z0-9*]+\.[a-zA-Z0-9*]+/;

export function extractEmailHint(text: string): string | undefined {
    const match = MASKED_EMAIL_PATTERN.exec(text);
    return match ? match[0] : undefined;
}

/**
 * Decide whether a login prompt is a verification challenge.
 *
 * The last emitted line is considered together with the prompt, since providers
 * often print "we sent a code" on one line and ask for "confirmation code" on the next.
 * Returns null when the prompt is not a recognised challenge.
 */
export function classifyPrompt(prompt: string, lastLine: string = ''): PromptClassification | null {
    const combined = `${lastLine} ${prompt}`;
    const text = combined.toLowerCase();

    let kind: ChallengeKind | null = null;
    if (text.includes('confirmation code') && text.includes('sent')) {
        kind = 'confirmation_code';
    } else if ((text.includes('email address') && text.includes('verify')) || text.includes('verify your identity')) {
        kind = 'email_verification';
    }

    if (!kind) {
        return null;
    }

    const hint = extractEmailHint(combined);
    return hint ? { kind, hint } : { kind };
}
