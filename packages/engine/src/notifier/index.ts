export { TelegramNotifier, TELEGRAM_API_BASE_URL, type TelegramNotifierConfig } from './telegram-notifier.js';
