import { GrammyError, type InlineKeyboard } from "grammy";

import { logger } from "../logger.js";

const log = logger.child("messenger");

export type EditResult =
  | { status: "ok" }
  | { status: "not_modified" }
  | { status: "failed"; error: string };

export interface ChatMessenger {
  editMessage(chatId: number, messageId: number, text: string, controls?: InlineKeyboard): Promise<EditResult>;
  sendMessage(chatId: number, text: string, controls?: InlineKeyboard): Promise<number>;
  deleteMessage(chatId: number, messageId: number): Promise<boolean>;
  pinMessage(chatId: number, messageId: number): Promise<boolean>;
}

interface MessageOptions {
  parse_mode: "Markdown";
  reply_markup?: InlineKeyboard;
}

/** The part of grammY's `Api` the messenger calls. */
export interface MessengerApi {
  editMessageText(chatId: number, messageId: number, text: string, other?: MessageOptions): Promise<unknown>;
  sendMessage(chatId: number, text: string, other?: MessageOptions): Promise<{ message_id: number }>;
  deleteMessage(chatId: number, messageId: number): Promise<unknown>;
  pinChatMessage(chatId: number, messageId: number, other?: { disable_notification?: boolean }): Promise<unknown>;
}

export const isNotModifiedError = (error: unknown): boolean =>
  error instanceof GrammyError && error.description.toLowerCase().includes("message is not modified");

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class TelegramMessenger implements ChatMessenger {
  constructor(private readonly api: MessengerApi) {}

  async editMessage(
    chatId: number,
    messageId: number,
    text: string,
    controls?: InlineKeyboard,
  ): Promise<EditResult> {
    try {
      await this.api.editMessageText(chatId, messageId, text, {
        parse_mode: "Markdown",
        reply_markup: controls,
      });
      return { status: "ok" };
    } catch (error) {
      if (isNotModifiedError(error)) {
        return { status: "not_modified" };
      }
      const message = errorText(error);
      log.warn("Edit rejected", { chatId, messageId, message });
      return { status: "failed", error: message };
    }
  }

  async sendMessage(chatId: number, text: string, controls?: InlineKeyboard): Promise<number> {
    const sent = await this.api.sendMessage(chatId, text, {
      parse_mode: "Markdown",
      reply_markup: controls,
    });
    return sent.message_id;
  }

  async deleteMessage(chatId: number, messageId: number): Promise<boolean> {
    try {
      await this.api.deleteMessage(chatId, messageId);
      return true;
    } catch (error) {
      log.warn("Delete failed", { chatId, messageId, message: errorText(error) });
      return false;
    }
  }

  async pinMessage(chatId: number, messageId: number): Promise<boolean> {
    try {
      await this.api.pinChatMessage(chatId, messageId, { disable_notification: true });
      return true;
    } catch (error) {
      log.warn("Pin failed", { chatId, messageId, message: errorText(error) });
      return false;
    }
  }
}
