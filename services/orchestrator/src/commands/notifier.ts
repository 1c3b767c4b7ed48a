import { defaultLogger, type ILogger } from "../lib/logger";

/**
 * Outbound chat messages. The chat transport lives outside this service.
 */
export interface ChatNotifier {
  send(message: string): Promise<void>;
}

/**
 * Notifier used when no chat transport is wired: messages go to the log
 */
export class LoggingNotifier implements ChatNotifier {
  private readonly logger: ILogger;

  constructor(logger: ILogger = defaultLogger) {
    this.logger = logger.child({ component: "chat" });
  }

  async send(message: string): Promise<void> {
    this.logger.info("Chat message", { chatMessage: message });
  }
}

/**
 * Send without letting a transport failure escape
 */
export async function notifySafely(notifier: ChatNotifier, message: string, logger: ILogger): Promise<void> {
  try {
    await notifier.send(message);
  } catch (error) {
    logger.error("Chat message could not be sent", error, { chatMessage: message });
  }
}
