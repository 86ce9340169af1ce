export interface InboundChatEvent {
  threadId: string;
  senderId: string;
  text: string;
  isDirectMessage: boolean;
  messageId: string;
  /**
   * Set for plain channel messages that do not address the bot: they only
   * matter as answers inside a conversation already in progress
   */
  requiresActiveSession: boolean;
}

export interface SendReplyResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface ChatTransport {
  sendReply(threadId: string, text: string, requestId: string): Promise<SendReplyResult>;
}
