import type { ConversationStore } from './conversation-store';
import { isAssigned, type AssignedPost, type DecodedPost } from './conversation.types';

export type Classification =
  | { action: 'attach_as_reply'; ancestor: AssignedPost }
  | { action: 'keep_candidate' }
  | { action: 'discard' };

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/**
 * Case-insensitive alternation of the tracked keywords, matched anywhere in the text.
 * Returns null for an empty keyword set: nothing matches.
 */
export function buildKeywordPattern(keywords: readonly string[]): RegExp | null {
  const parts = keywords.map((k) => k.trim()).filter(Boolean).map((k) => k.replace(REGEX_SPECIALS, '\\$&'));
  if (parts.length === 0) return null;
  return new RegExp(parts.join('|'), 'i');
}

export class ConversationClassifier {
  private readonly pattern: RegExp | null;

  constructor(
    private readonly store: Pick<ConversationStore, 'getPostByExternalId'>,
    keywords: readonly string[],
  ) {
    this.pattern = buildKeywordPattern(keywords);
  }

  matchesKeywords(text: string): boolean {
    return this.pattern ? this.pattern.test(text) : false;
  }

  /**
   * Thread membership wins over topical relevance. A reply whose target is missing
   * or still unassigned is judged on its keywords alone; the target may arrive later.
   */
  async classify(post: DecodedPost): Promise<Classification> {
    const targetId = post.inReplyToExternalId;
    if (targetId) {
      const target = await this.store.getPostByExternalId(targetId);
      if (target && isAssigned(target)) return { action: 'attach_as_reply', ancestor: target };
    }
    if (this.matchesKeywords(post.text)) return { action: 'keep_candidate' };
    return { action: 'discard' };
  }
}
