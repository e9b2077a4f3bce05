export interface AIChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface AIRequest {
  systemPrompt: string;
  userMessage: string;
  context?: string;
  history?: AIChatMessage[];
}

export interface AIResponse {
  text: string;
  finishReason?: string;
}

export interface RateLimitStatus {
  dailyUsed: number;
  dailyLimit: number;
  isLimited: boolean;
  resetsAt: string;
}
