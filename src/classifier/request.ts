import {
  MAJOR_CATEGORIES,
  type EmailAddress,
  type MajorCategory,
  type NormalizedMessage,
  type SignalsBundle,
} from "../types/index.js";
import { SUB_ACTION_KEYS } from "./taxonomy.js";

export interface ClassificationRequest {
  messageId: string;
  threadId: string | null;
  subject: string;
  sender: EmailAddress | null;
  to: string[];
  cc: string[];
  sentAt: string | null;
  snippet: string;
  bodyText: string;
  bodyTruncated: boolean;
  signals: SignalsBundle;
  taxonomy: {
    majorCategories: readonly MajorCategory[];
    subActionKeys: readonly string[];
  };
  promptVersion: string;
}

export function buildClassificationRequest(
  message: NormalizedMessage,
  signals: SignalsBundle,
  promptVersion: string
): ClassificationRequest {
  return {
    messageId: message.messageId,
    threadId: message.threadId,
    subject: message.subject,
    sender: message.sender,
    to: message.to,
    cc: message.cc,
    sentAt: message.sentAt ? message.sentAt.toISOString() : null,
    snippet: message.snippet,
    bodyText: message.bodyText,
    bodyTruncated: message.bodyTruncated,
    signals,
    taxonomy: {
      majorCategories: MAJOR_CATEGORIES,
      subActionKeys: SUB_ACTION_KEYS,
    },
    promptVersion,
  };
}

/**
 * User message content for the model. The taxonomy already lives in the
 * system prompt, so it is left out here.
 */
export function renderUserContent(request: ClassificationRequest): string {
  const { taxonomy: _taxonomy, promptVersion: _promptVersion, ...email } = request;
  return JSON.stringify(email);
}
