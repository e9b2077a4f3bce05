import { Bot, Context, InputFile } from 'grammy';
import { env } from '../../config/env';
import { DEFAULT_MESSAGES, MAX_UPLOAD_BYTES } from '../../config/constants';
import { routeMessage } from '../chat/router';
import { clearConversationHistory } from '../ai/conversation-history';
import { handleExport } from '../export';
import { isSupportedReceiptType } from '../receipt/handler';
import { getErrorMessage } from '../../utils/errors';
import { ExportFormat } from '../../types/export';
import { ReceiptUpload } from '../../types/expense';
import { getExportMenuKeyboard, getMainMenuKeyboard, MENU_PHRASES } from './buttons';

const EXPORT_FORMATS: ExportFormat[] = ['csv', 'json', 'pdf'];

let bot: Bot | null = null;

// Show animated thinking message that cycles through dots
async function showThinking(ctx: Context): Promise<() => Promise<void>> {
  const chatId = ctx.chat?.id;
  if (!chatId) return async () => {};

  const frames = ['.', '..', '...'];
  let frameIndex = 0;
  const msg = await ctx.reply(frames[0]);

  const interval = setInterval(() => {
    frameIndex = (frameIndex + 1) % frames.length;
    ctx.api.editMessageText(chatId, msg.message_id, frames[frameIndex]).catch((error: unknown) => {
      console.log('[Bot] Thinking frame skipped:', getErrorMessage(error));
    });
  }, 400);

  return async () => {
    clearInterval(interval);
    try {
      await ctx.api.deleteMessage(chatId, msg.message_id);
    } catch (error) {
      console.log('[Bot] Thinking message already gone:', getErrorMessage(error));
    }
  };
}

async function downloadFile(ctx: Context, fileId: string): Promise<Buffer> {
  const file = await ctx.api.getFile(fileId);
  if (!file.file_path) {
    throw new Error('Telegram returned no file path');
  }

  const response = await fetch(`https://api.telegram.org/file/bot${env.TELEGRAM_BOT_TOKEN}/${file.file_path}`);
  if (!response.ok) {
    throw new Error(`File download failed with status ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

async function replyWithRoute(ctx: Context, userId: string, text: string, attachment?: ReceiptUpload): Promise<void> {
  const hideThinking = await showThinking(ctx);
  try {
    const response = await routeMessage({ userId, text, attachment });
    await hideThinking();
    await ctx.reply(response.message, { reply_markup: getMainMenuKeyboard() });
  } catch (e) {
    await hideThinking();
    throw e;
  }
}

async function sendExport(ctx: Context, userId: string, format: ExportFormat): Promise<void> {
  const result = await handleExport({ userId, format });
  const data = typeof result.data === 'string' ? Buffer.from(result.data, 'utf8') : result.data;
  await ctx.replyWithDocument(new InputFile(data, result.fileName));
}

function parseExportFormat(value: string | undefined): ExportFormat | null {
  const format = value?.toLowerCase();
  return EXPORT_FORMATS.find((f) => f === format) ?? null;
}

export function initializeBot(token: string): Bot {
  const instance = new Bot(token);

  instance.command('start', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (userId) {
      clearConversationHistory(userId);
    }
    await ctx.reply(DEFAULT_MESSAGES.WELCOME, { reply_markup: getMainMenuKeyboard() });
  });

  instance.command('help', async (ctx) => {
    await ctx.reply(DEFAULT_MESSAGES.HELP, { reply_markup: getMainMenuKeyboard() });
  });

  instance.command('budget', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply('Unable to identify user');
      return;
    }

    // "/budget Groceries 300" sets one, a bare "/budget" shows them
    const args = ctx.match.trim();
    await replyWithRoute(ctx, userId, args ? `set budget ${args}` : MENU_PHRASES.budget);
  });

  instance.command('export', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply('Unable to identify user');
      return;
    }

    const format = parseExportFormat(ctx.match.trim().split(/\s+/)[0]);
    if (!format) {
      await ctx.reply('Choose a format:', { reply_markup: getExportMenuKeyboard() });
      return;
    }

    await sendExport(ctx, userId, format);
  });

  instance.on('callback_query:data', async (ctx) => {
    const userId = ctx.from.id.toString();
    const action = ctx.callbackQuery.data;
    await ctx.answerCallbackQuery();

    if (action === 'export') {
      await ctx.reply('Choose a format:', { reply_markup: getExportMenuKeyboard() });
      return;
    }
    if (action === 'back_main') {
      await ctx.reply(DEFAULT_MESSAGES.WELCOME, { reply_markup: getMainMenuKeyboard() });
      return;
    }

    const format = action.startsWith('export_') ? parseExportFormat(action.slice('export_'.length)) : null;
    if (format) {
      await sendExport(ctx, userId, format);
      return;
    }

    const phrase = MENU_PHRASES[action];
    if (phrase) {
      await replyWithRoute(ctx, userId, phrase);
    }
  });

  instance.on('message:text', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) return;
    await replyWithRoute(ctx, userId, ctx.message.text);
  });

  instance.on('message:photo', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) return;

    // Telegram lists sizes ascending; take the largest
    const photos = ctx.message.photo;
    const photo = photos[photos.length - 1];
    const content = await downloadFile(ctx, photo.file_id);

    await replyWithRoute(ctx, userId, ctx.message.caption ?? '', {
      content,
      mimeType: 'image/jpeg',
      fileName: `${photo.file_unique_id}.jpg`,
    });
  });

  instance.on('message:document', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) return;

    const document = ctx.message.document;
    const mimeType = document.mime_type ?? 'application/octet-stream';

    if (!isSupportedReceiptType(mimeType)) {
      await ctx.reply('Send the receipt as a photo, a PDF or a text file.');
      return;
    }
    if ((document.file_size ?? 0) > MAX_UPLOAD_BYTES) {
      await ctx.reply('That file is larger than 10 MB.');
      return;
    }

    const content = await downloadFile(ctx, document.file_id);
    await replyWithRoute(ctx, userId, ctx.message.caption ?? '', {
      content,
      mimeType,
      fileName: document.file_name,
    });
  });

  instance.catch(async (err) => {
    console.error('[Bot] Update failed:', getErrorMessage(err.error));
    try {
      await err.ctx.reply(DEFAULT_MESSAGES.ERROR);
    } catch (replyError) {
      console.error('[Bot] Could not send error reply:', getErrorMessage(replyError));
    }
  });

  bot = instance;
  console.log('[Bot] Commands registered');
  return instance;
}

export async function startBot(): Promise<void> {
  if (!bot) {
    throw new Error('Bot not initialized. Call initializeBot() first.');
  }
  await bot.start({ onStart: (info) => console.log(`[Bot] Running as @${info.username}`) });
}

export async function stopBot(): Promise<void> {
  if (bot) {
    await bot.stop();
    bot = null;
  }
}
