/**
 * Notifications Module
 */

export type { NotificationSink } from './NotificationSink';
export { escapeMarkdown, formatAlert } from './formatAlert';
export { TelegramNotifier } from './TelegramNotifier';
export type { TelegramNotifierConfig } from './TelegramNotifier';
export { ConsoleNotifier } from './ConsoleNotifier';
