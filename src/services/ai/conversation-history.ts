import { MAX_HISTORY_MESSAGES } from '../../config/constants';
import { AIChatMessage } from '../../types/ai';
import { ChatMessage } from '../../types/chat';

const conversationStore = new Map<string, ChatMessage[]>();

export function getConversationHistory(userId: string): ChatMessage[] {
  return [...(conversationStore.get(userId) ?? [])];
}

export function addToHistory(userId: string, userMessage: string, assistantResponse: string, now: Date = new Date()): void {
  const history = conversationStore.get(userId) ?? [];
  const timestamp = now.toISOString();

  history.push(
    { sender: 'user', text: userMessage, timestamp },
    { sender: 'assistant', text: assistantResponse, timestamp }
  );

  // Keep only the last N messages
  conversationStore.set(userId, history.slice(-MAX_HISTORY_MESSAGES));
}

export function toAIHistory(messages: ChatMessage[]): AIChatMessage[] {
  return messages.map((m) => ({ role: m.sender, content: m.text }));
}

export function clearConversationHistory(userId: string): void {
  conversationStore.delete(userId);
}
