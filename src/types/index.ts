// --- Provider input (Gmail "Message" resource) ---

export type BodyEncoding = "base64url" | "7bit" | "quoted-printable";

export interface RawHeader {
  name: string;
  value: string;
}

export interface RawPartBody {
  size?: number | null;
  data?: string | null;
  attachmentId?: string | null;
  /** Transport encoding of `data`. Gmail always sends base64url, which is also the default. */
  encoding?: string | null;
}

export interface RawPart {
  partId?: string | null;
  mimeType: string;
  filename?: string | null;
  headers?: RawHeader[] | null;
  body?: RawPartBody | null;
  parts?: RawPart[] | null;
}

export interface RawMessage {
  provider?: string | null;
  id: string;
  threadId?: string | null;
  labelIds?: string[] | null;
  snippet?: string | null;
  historyId?: string | null;
  internalDate?: string | null;
  sizeEstimate?: number | null;
  payload: RawPart;
}

// --- Normalized message ---

export interface EmailAddress {
  name: string | null;
  email: string;
}

export interface AttachmentMeta {
  filename: string | null;
  mimeType: string;
  size: number;
  attachmentId: string | null;
}

export interface NormalizedMessage {
  provider: string;
  messageId: string;
  threadId: string | null;
  labelIds: string[];
  subject: string;
  sender: EmailAddress | null;
  to: string[];
  cc: string[];
  recipients: string[];
  sentAt: Date | null;
  internalDate: Date | null;
  snippet: string;
  bodyText: string;
  bodyTruncated: boolean;
  bodyHtmlPresent: boolean;
  attachments: AttachmentMeta[];
  headers: Record<string, string>;
}

// --- Signals ---

export type TimePhraseType = "absolute" | "relative" | "recurring";

export interface MoneyMention {
  rawText: string;
  currency: string | null;
  amount: number;
}

export interface TimePhrase {
  rawText: string;
  approximateType: TimePhraseType;
}

export interface SignalsBundle {
  urls: string[];
  moneyMentions: MoneyMention[];
  timePhrases: TimePhrase[];
}

// --- Triage output contract ---

export const MAJOR_CATEGORIES = [
  "core_communication",
  "decisions_and_approvals",
  "schedule_and_time",
  "documents_and_review",
  "financial_and_admin",
  "people_and_process",
  "information_and_org",
  "learning_and_awareness",
  "social_and_people",
  "meta_and_systems",
  "other",
] as const;

export type MajorCategory = (typeof MAJOR_CATEGORIES)[number];

export const PRIORITY_LEVELS = ["low", "medium", "high", "critical"] as const;
export type PriorityLevel = (typeof PRIORITY_LEVELS)[number];

export const ACTION_KINDS = ["PRIMARY", "SECONDARY", "DANGER"] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export const DATE_TYPES = ["meeting_time", "deadline", "event_time", "other"] as const;
export type DateType = (typeof DATE_TYPES)[number];

export interface TaskProposal {
  type: string | null;
  title: string;
  description: string;
  priority: PriorityLevel;
  status: "open";
  scheduled_for: string | null;
  due_at: string | null;
  waiting_on: string | null;
}

export interface RecommendedAction {
  key: string;
  label: string;
  kind: ActionKind;
  rank: number;
}

export interface UrgencySignals {
  urgency: PriorityLevel;
  deadline_detected: boolean;
  deadline_text: string | null;
  reply_by: string | null;
  reason: string;
}

export interface ExtractedSummary {
  ask: string;
  success_criteria: string;
  missing_info: string[];
}

export interface PersonRef {
  email: string;
  role: string;
}

export interface DateRef {
  text: string;
  iso: string | null;
  type: DateType;
}

export interface MoneyRef {
  text: string;
  amount: number | null;
  currency: string | null;
}

export interface DocRef {
  title: string | null;
  url: string | null;
  type: string | null;
}

export interface MeetingRef {
  topic: string | null;
  start_at: string | null;
  tz: string | null;
}

export interface Entities {
  people: PersonRef[];
  dates: DateRef[];
  money: MoneyRef[];
  docs: DocRef[];
  meeting: MeetingRef | null;
}

export type DebugFlag = "classification_fallback" | "evidence_below_minimum";

export interface DebugInfo {
  timestamp: string;
  model_version: string;
  prompt_version: string;
  flags: DebugFlag[];
}

export interface TriageOutput {
  major_category: MajorCategory;
  sub_action_key: string;
  explicit_task: boolean;
  confidence: number;
  suggested_reply_action: string[];
  task_proposal: TaskProposal | null;
  recommended_actions: RecommendedAction[];
  urgency_signals: UrgencySignals;
  extracted_summary: ExtractedSummary;
  entities: Entities;
  evidence: string[];
  debug: DebugInfo;
}

export interface TriageResponse {
  output: TriageOutput;
}

// --- Core configuration ---

export interface TriageSettings {
  readonly maxBodyChars: number;
  readonly defaultTimezone: string;
  /** Used when the candidate's confidence is missing or not numeric. */
  readonly defaultConfidence: number;
  /** Used for the whole-output fallback when classification fails. */
  readonly fallbackConfidence: number;
  readonly fallbackCategory: MajorCategory;
  readonly fallbackActionKey: string;
  readonly gatewayTimeoutMs: number;
  readonly modelVersion: string;
  readonly fallbackModelVersion: string;
  readonly promptVersion: string;
  readonly verifyOutput: boolean;
}
