import { Bot } from "grammy";
import type { NotifyConfig } from "../config/types.newsdesk.js";
import { createSubsystemLogger, describeError } from "../logging/logger.js";

const log = createSubsystemLogger("ops/notify");

export type TelegramSender = {
  sendMessage: (chatId: string, text: string) => Promise<unknown>;
};

export type OperatorNotifier = {
  /** Summary after a batch; sent only when notifyOnRun is enabled. */
  runSummary: (text: string) => Promise<void>;
  /** Always sent when a chat is configured. */
  fatal: (text: string) => Promise<void>;
};

export function createTelegramSender(token: string): TelegramSender {
  const bot = new Bot(token);
  return {
    sendMessage: (chatId, text) => bot.api.sendMessage(chatId, text),
  };
}

export function createOperatorNotifier(params: {
  config?: NotifyConfig;
  sender?: TelegramSender;
}): OperatorNotifier {
  const chatIds = (params.config?.telegram?.chatIds ?? []).map((chatId) => String(chatId));
  const sender = params.sender;
  const send = async (text: string) => {
    if (!sender || chatIds.length === 0) {
      return;
    }
    for (const chatId of chatIds) {
      try {
        await sender.sendMessage(chatId, text);
      } catch (err) {
        log.warn(`telegram notify to ${chatId} failed: ${describeError(err)}`);
      }
    }
  };
  return {
    async runSummary(text) {
      if (params.config?.notifyOnRun) {
        await send(text);
      }
    },
    fatal: send,
  };
}

export function formatRunSummary(params: {
  profile: string;
  counts: Record<string, number>;
  tokens: number;
}): string {
  const lines = Object.entries(params.counts).map(([key, value]) => `${key}: ${value}`);
  return [`News run complete (${params.profile})`, ...lines, `tokens: ${params.tokens}`].join("\n");
}
