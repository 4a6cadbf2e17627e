/**
 * A stored trigger: when `triggeredBy` appears in a message, the bot replies
 * with `text` or reacts with `emoji`.
 */
export interface Trigger {
  triggeredBy: string;
  text?: string;
  emoji?: string;
}
