export interface InlineButton {
  text: string;
  callbackData: string;
}

export type InlineKeyboard = InlineButton[][];

/**
 * Outbound chat operations. Message-producing calls resolve to the new
 * message id. `sendMedia` rejects with `SendError` and `deleteMessage`
 * with `DeleteError`.
 */
export interface ChatTransport {
  sendText(chatId: number, html: string, keyboard?: InlineKeyboard): Promise<number>;
  sendMedia(
    chatId: number,
    mediaUrl: string,
    captionHtml: string,
    isVideo: boolean,
    keyboard?: InlineKeyboard,
  ): Promise<number>;
  editText(chatId: number, messageId: number, html: string, keyboard?: InlineKeyboard): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  answerCallback(callbackId: string, text?: string): Promise<void>;
  sendTyping(chatId: number): Promise<void>;
}
