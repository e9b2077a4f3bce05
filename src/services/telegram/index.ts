export { initializeBot, startBot, stopBot } from './bot';
export { getMainMenuKeyboard, getExportMenuKeyboard, MENU_PHRASES } from './buttons';
