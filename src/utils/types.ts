export type ConversationMessage = {
  sender: string;
  text: string;
  timestamp?: string;
};

export type MessageMetadata = {
  channel?: string;
  language?: string;
  locale?: string;
};

export type HoneypotRequest = {
  sessionId: string;
  message: ConversationMessage;
  conversationHistory: ConversationMessage[];
  metadata?: MessageMetadata;
};
