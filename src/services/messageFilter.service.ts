import type { RelayMessage } from '../types/relay.types';

export const MESSAGE_CATEGORIES = ['order', 'support', 'query', 'other'] as const;
export type MessageCategory = typeof MESSAGE_CATEGORIES[number];
export type CategoryFilter = MessageCategory | 'all';

export class MessageFilter {
    // Checked in order; the first category with a matching keyword wins
    private static readonly KEYWORDS: ReadonlyArray<[MessageCategory, string[]]> = [
        ['order', ['order', 'buy', 'purchase', 'price', 'cost', 'payment']],
        ['support', ['help', 'issue', 'problem', 'error', 'broken', 'fix']],
        ['query', ['question', 'ask', 'how', 'what', 'when', 'where', 'why']]
    ];

    static categorize(text: string): MessageCategory {
        const lower = text.toLowerCase();
        for (const [category, keywords] of this.KEYWORDS) {
            if (keywords.some((keyword) => lower.includes(keyword))) {
                return category;
            }
        }
        return 'other';
    }

    static filterMessages(messages: RelayMessage[], category: CategoryFilter): RelayMessage[] {
        if (category === 'all') {
            return messages;
        }
        return messages.filter((message) => this.categorize(message.text) === category);
    }

    static isCategoryFilter(value: unknown): value is CategoryFilter {
        return value === 'all' || MESSAGE_CATEGORIES.some((category) => category === value);
    }
}
