import { injectable } from "inversify";

import { TransientDispatchError } from "./realtime.errors";

type Topic = string;

/**
 * Minimal member shape the hub relies on.
 * Kept structural so tests can join plain objects.
 */
export interface RealtimeMember {
  readonly id: string;
  readonly topics: Set<Topic>;
  isOpen(): boolean;
  send(data: string): void;
}

export type BroadcastReport = {
  topic: Topic;
  delivered: number;
  skipped: number;
  failures: TransientDispatchError[];
};

@injectable()
export class RealtimeHub {
  private readonly topics = new Map<Topic, Set<RealtimeMember>>();

  join(topic: Topic, member: RealtimeMember): void {
    let set = this.topics.get(topic);
    if (!set) {
      set = new Set<RealtimeMember>();
      this.topics.set(topic, set);
    }

    set.add(member);
    member.topics.add(topic);
  }

  leave(topic: Topic, member: RealtimeMember): void {
    member.topics.delete(topic);

    const set = this.topics.get(topic);
    if (!set) return;

    set.delete(member);

    if (set.size === 0) {
      this.topics.delete(topic);
    }
  }

  leaveAll(member: RealtimeMember): void {
    for (const topic of [...member.topics]) {
      this.leave(topic, member);
    }
  }

  size(topic: Topic): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  /**
   * At-most-once, best-effort delivery to everyone joined right now.
   * Never throws; a failing member does not stop delivery to the rest.
   */
  broadcast(topic: Topic, event: unknown): BroadcastReport {
    const report: BroadcastReport = {
      topic,
      delivered: 0,
      skipped: 0,
      failures: [],
    };

    const set = this.topics.get(topic);
    if (!set || set.size === 0) return report;

    let payload: string;
    try {
      payload = JSON.stringify(event);
    } catch (err) {
      report.failures.push(
        new TransientDispatchError("Event is not serializable", { topic, err }),
      );
      return report;
    }

    // snapshot: members joining during delivery wait for the next broadcast
    for (const member of [...set]) {
      if (!member.isOpen()) {
        report.skipped += 1;
        continue;
      }

      try {
        member.send(payload);
        report.delivered += 1;
      } catch (err) {
        report.failures.push(
          new TransientDispatchError("Send failed", {
            topic,
            memberId: member.id,
            err,
          }),
        );
      }
    }

    return report;
  }
}
