import type { Trigger } from '../model/Trigger.js';

/**
 * Trigger persistence, keyed by team. Implementations throw DatabaseError.
 */
export interface TriggerStore {
  /** All triggers of a team, for display */
  list(teamId: string): Promise<Trigger[]>;

  /** Candidate triggers to match against a message */
  search(teamId: string): Promise<Trigger[]>;

  addText(teamId: string, triggeredBy: string, text: string): Promise<void>;
  addEmoji(teamId: string, triggeredBy: string, emoji: string): Promise<void>;
  del(teamId: string, triggeredBy: string): Promise<void>;
}

/**
 * In-memory implementation of the trigger store.
 * One trigger per (team, triggeredBy); adding again replaces the previous one.
 */
export class InMemoryTriggerStore implements TriggerStore {
  private teams = new Map<string, Map<string, Trigger>>();

  async list(teamId: string): Promise<Trigger[]> {
    return this.triggersOf(teamId).sort((a, b) =>
      a.triggeredBy < b.triggeredBy ? -1 : a.triggeredBy > b.triggeredBy ? 1 : 0,
    );
  }

  async search(teamId: string): Promise<Trigger[]> {
    return this.triggersOf(teamId);
  }

  async addText(teamId: string, triggeredBy: string, text: string): Promise<void> {
    this.team(teamId).set(triggeredBy, { triggeredBy, text });
  }

  async addEmoji(teamId: string, triggeredBy: string, emoji: string): Promise<void> {
    this.team(teamId).set(triggeredBy, { triggeredBy, emoji });
  }

  async del(teamId: string, triggeredBy: string): Promise<void> {
    this.teams.get(teamId)?.delete(triggeredBy);
  }

  private team(teamId: string): Map<string, Trigger> {
    let team = this.teams.get(teamId);
    if (!team) {
      team = new Map();
      this.teams.set(teamId, team);
    }
    return team;
  }

  // copies, so callers cannot edit stored triggers
  private triggersOf(teamId: string): Trigger[] {
    const team = this.teams.get(teamId);
    if (!team) return [];
    return Array.from(team.values(), (t) => ({ ...t }));
  }
}
