/**
 * Chat Models
 */

export type ChatRole = 'user' | 'assistant';

export interface SendMessageRequest {
  message: string;
  conversationId?: string;
}

export interface ChatResponse {
  reply: string;
  messageId: string;
  conversationId: string;
  suggestedFollowUps: string[];
}

export interface Conversation {
  id: string;
  userId: string;
  title: string;
  lastMessageAt: string | null;
  createdAt: string | null;
}

export interface ChatMessage {
  id: string;
  conversationId: string;
  role: ChatRole;
  content: string;
  createdAt: string | null;
}
