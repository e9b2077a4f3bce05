import { recordReceipt } from '../receipt/handler';
import { addToHistory } from '../ai/conversation-history';
import { classifyMessage } from './nlu';
import { INTENT_HANDLERS } from './handlers';
import { env } from '../../config/env';
import { DEFAULT_MESSAGES } from '../../config/constants';
import { AppError, getErrorMessage } from '../../utils/errors';
import { formatAmount } from '../../utils/money';
import { ChatReply, ChatResponse, ClassifiedMessage, IncomingChatMessage } from '../../types/chat';
import { ReceiptUpload } from '../../types/expense';

async function handleReceipt(userId: string, upload: ReceiptUpload | undefined, now: Date): Promise<ChatReply> {
  if (!upload) {
    return { message: "Send me a photo of the receipt and I'll record it." };
  }

  const { receipt, expenses, alerts } = await recordReceipt(userId, upload, now);
  const lines = [
    `Receipt from ${receipt.storeName} recorded: ${formatAmount(receipt.totalAmount, env.DEFAULT_CURRENCY)}.`,
    ...expenses.map((e) => `- ${e.category}: ${formatAmount(e.amount, e.currency)}`),
    ...alerts.map((a) => a.message),
  ];
  return { message: lines.join('\n'), expenses, alerts };
}

async function dispatch(incoming: IncomingChatMessage, classified: ClassifiedMessage, text: string, now: Date): Promise<ChatReply> {
  if (classified.intent === 'upload_receipt') {
    return handleReceipt(incoming.userId, incoming.attachment, now);
  }

  const handler = INTENT_HANDLERS[classified.intent];
  return handler({ userId: incoming.userId, text, entities: classified.entities, now });
}

/**
 * Entry point for every chat message: classify, run the intent's handler and
 * record the exchange in the user's history.
 */
export async function routeMessage(incoming: IncomingChatMessage, now: Date = new Date()): Promise<ChatResponse> {
  const text = incoming.text?.trim() ?? '';

  if (!text && !incoming.attachment) {
    return { message: DEFAULT_MESSAGES.EMPTY_MESSAGE, intent: 'unknown', expenses: [], alerts: [] };
  }

  const classified: ClassifiedMessage = incoming.attachment
    ? { intent: 'upload_receipt', entities: {} }
    : await classifyMessage(text, now);

  console.log(`[Router] User ${incoming.userId} -> ${classified.intent}`);

  let reply: ChatReply;
  try {
    reply = await dispatch(incoming, classified, text, now);
  } catch (error) {
    if (error instanceof AppError) {
      reply = { message: error.message };
    } else {
      console.error('[Router] Handler failed:', getErrorMessage(error));
      reply = { message: DEFAULT_MESSAGES.ERROR };
    }
  }

  addToHistory(incoming.userId, text || `[receipt ${incoming.attachment?.fileName ?? 'upload'}]`, reply.message, now);

  return {
    message: reply.message,
    intent: classified.intent,
    expenses: reply.expenses ?? [],
    alerts: reply.alerts ?? [],
  };
}
