import { MAJOR_CATEGORIES, type MajorCategory } from "../types/index.js";

export const OTHER_ACTION_KEY = "OTHER";

/** Recommended sub-action keys, grouped by the major category they belong to. */
export const SUB_ACTION_KEYS_BY_CATEGORY = {
  schedule_and_time: [
    "SCHEDULE_PROPOSE_TIME",
    "SCHEDULE_CONFIRM_TIME",
    "SCHEDULE_RESCHEDULE",
    "SCHEDULE_RSVP",
    "SCHEDULE_ADD_CALENDAR_BLOCK",
    "SCHEDULE_DEADLINE_CONFIRM",
  ],
  decisions_and_approvals: [
    "DECISION_APPROVE_REJECT",
    "DECISION_CHOOSE_OPTION",
    "DECISION_CONFIRM_OUTCOME",
  ],
  core_communication: [
    "COMM_REPLY_REQUIRED",
    "COMM_CLARIFICATION_REQUEST",
    "COMM_STATUS_UPDATE_RESPONSE",
  ],
  documents_and_review: ["DOC_REVIEW_REQUEST", "DOC_COMMENT_REQUEST", "DOC_SIGNOFF_REQUEST"],
  financial_and_admin: [
    "FINANCE_PAY_INVOICE",
    "FINANCE_APPROVE_EXPENSE",
    "FINANCE_UPDATE_BILLING",
    "FINANCE_RENEW_CANCEL",
  ],
  meta_and_systems: ["SYSTEM_ALERT", "SYSTEM_SECURITY", "SYSTEM_NOTIFICATION"],
  social_and_people: ["SOCIAL_INTRO", "SOCIAL_INVITE", "SOCIAL_CONGRATS"],
  people_and_process: ["PROCESS_HANDOFF", "PROCESS_OWNERSHIP_CHANGE", "PROCESS_WORKFLOW_UPDATE"],
  information_and_org: ["INFO_FYI", "INFO_STATUS_REPORT", "INFO_ANNOUNCEMENT"],
  learning_and_awareness: ["LEARN_ARTICLE", "LEARN_WEBINAR", "LEARN_COURSE"],
  other: [],
} as const satisfies Record<MajorCategory, readonly string[]>;

export const SUB_ACTION_KEYS: readonly string[] = [
  ...MAJOR_CATEGORIES.flatMap((category) => SUB_ACTION_KEYS_BY_CATEGORY[category]),
  OTHER_ACTION_KEY,
];

const KNOWN_KEYS = new Set(SUB_ACTION_KEYS);

export function isKnownSubActionKey(key: string): boolean {
  return KNOWN_KEYS.has(key);
}
