/**
 * Astrologer Chat Service
 *
 * Generates chat replies through the OpenAI chat completions API. When no
 * API key is configured, or the request still fails after retries, a
 * deterministic reply for the question's topic is returned instead.
 */

import axios, { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { openAIConfig } from '../config';
import topicData from '../data/chat/topics.json';
import { withRetry } from '../utils/retryUtils';

const BASE_URL = 'https://api.openai.com/v1';
const MAX_HISTORY_MESSAGES = 10;

// =============================================================================
// Types
// =============================================================================

export type ChatRole = 'user' | 'assistant';

export interface ChatHistoryEntry {
    role: ChatRole;
    content: string;
}

export interface BirthContext {
    sunSign?: string | null;
    moonSign?: string | null;
    risingSign?: string | null;
    birthDate?: string | null;
}

export interface ChatReply {
    reply: string;
    suggestedFollowUps: string[];
    source: 'ai' | 'fallback';
}

export type ChatTopic = {
    id: string;
    keywords: string[];
    followUps: string[];
    fallback: string;
};

const TOPICS: readonly ChatTopic[] = topicData.topics;
const GENERAL_TOPIC: ChatTopic = TOPICS[TOPICS.length - 1];

const aiReplySchema = z.object({
    reply: z.string().min(1),
    suggestedFollowUps: z.array(z.string()).optional(),
});

// =============================================================================
// Prompt
// =============================================================================

const ASTROLOGER_PERSONA = `You are a warm, grounded astrologer answering questions in a mobile app.

Tone guidelines:
- Speak plainly and kindly, 2-4 sentences
- Refer to planets and signs from the user's chart when provided
- Never predict death, illness or financial ruin
- Astrology is for reflection and entertainment, not professional advice

Respond with JSON only:
{
  "reply": "Your answer",
  "suggestedFollowUps": ["Up to three short follow-up questions"]
}`;

function describeBirthContext(context?: BirthContext | null): string {
    if (!context) return '';
    return [
        context.sunSign ? `Sun sign: ${context.sunSign}` : '',
        context.moonSign ? `Moon sign: ${context.moonSign}` : '',
        context.risingSign ? `Rising sign: ${context.risingSign}` : '',
        context.birthDate ? `Born: ${context.birthDate}` : '',
    ]
        .filter(Boolean)
        .join('\n');
}

export function classifyTopic(message: string): ChatTopic {
    const lower = message.toLowerCase();
    return (
        TOPICS.find((topic) => topic.keywords.some((keyword) => lower.includes(keyword))) ??
        GENERAL_TOPIC
    );
}

export function followUpsFor(topic: ChatTopic, hasBirthContext: boolean): string[] {
    if (hasBirthContext) {
        return [...topic.followUps];
    }
    return [...topic.followUps.slice(0, 2), topicData.shareBirthDetailsPrompt];
}

// =============================================================================
// Service
// =============================================================================

export class ChatService {
    private client: AxiosInstance | null;
    private model: string;

    constructor(apiKey: string, model: string, client?: AxiosInstance) {
        this.model = model || 'gpt-4.1-mini';

        if (client) {
            this.client = client;
        } else if (apiKey) {
            this.client = axios.create({
                baseURL: BASE_URL,
                headers: {
                    Authorization: `Bearer ${apiKey}`,
                    'Content-Type': 'application/json',
                },
                timeout: 30000,
            });
        } else {
            this.client = null;
        }
    }

    async generateReply(params: {
        message: string;
        history?: ChatHistoryEntry[];
        birthContext?: BirthContext | null;
    }): Promise<ChatReply> {
        const { message, history = [], birthContext } = params;
        const topic = classifyTopic(message);
        const contextSummary = describeBirthContext(birthContext);
        const hasBirthContext = contextSummary.length > 0;

        const fallback = (): ChatReply => ({
            reply: topic.fallback,
            suggestedFollowUps: followUpsFor(topic, hasBirthContext),
            source: 'fallback',
        });

        if (!this.client) {
            functions.logger.warn('[chat] OpenAI API key not configured, using fallback reply');
            return fallback();
        }
        const client = this.client;

        try {
            const response = await withRetry(
                async () => await client.post('/chat/completions', {
                    model: this.model,
                    temperature: 0.8,
                    response_format: { type: 'json_object' },
                    messages: [
                        {
                            role: 'system',
                            content: contextSummary
                                ? `${ASTROLOGER_PERSONA}\n\nUser chart:\n${contextSummary}`
                                : ASTROLOGER_PERSONA,
                        },
                        ...history.slice(-MAX_HISTORY_MESSAGES),
                        { role: 'user', content: message },
                    ],
                }),
                { initialDelayMs: 500, label: 'chat' },
            );

            const content = response.data?.choices?.[0]?.message?.content;
            if (typeof content !== 'string' || content.trim().length === 0) {
                throw new Error('Empty response from OpenAI');
            }

            const parsed = aiReplySchema.parse(JSON.parse(content));
            const followUps = parsed.suggestedFollowUps?.filter((item) => item.trim().length > 0) ?? [];

            return {
                reply: parsed.reply.trim(),
                suggestedFollowUps:
                    followUps.length > 0 ? followUps.slice(0, 3) : followUpsFor(topic, hasBirthContext),
                source: 'ai',
            };
        } catch (error) {
            functions.logger.error('[chat] Failed to generate reply:', error);
            return fallback();
        }
    }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let chatServiceInstance: ChatService | null = null;

export const getChatService = (): ChatService => {
    if (!chatServiceInstance) {
        chatServiceInstance = new ChatService(openAIConfig.apiKey, openAIConfig.model);
    }
    return chatServiceInstance;
};
