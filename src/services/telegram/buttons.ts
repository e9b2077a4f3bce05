import { InlineKeyboard } from 'grammy';

/**
 * Inline shortcuts shown under bot replies
 */

export function getMainMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📊 Summary', 'summary')
    .text('💰 Budgets', 'budget')
    .row()
    .text('📈 Trend', 'trend')
    .text('💡 Suggestions', 'suggestions')
    .row()
    .text('📤 Export', 'export')
    .text('❓ Help', 'help');
}

export function getExportMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📄 CSV', 'export_csv')
    .text('🧾 JSON', 'export_json')
    .text('📕 PDF', 'export_pdf')
    .row()
    .text('« Back', 'back_main');
}

/**
 * Chat phrase each menu button stands for
 */
export const MENU_PHRASES: Record<string, string> = {
  summary: 'summary of this month',
  budget: 'how are my budgets',
  trend: 'monthly trend',
  suggestions: 'suggestions',
  help: 'help',
};
