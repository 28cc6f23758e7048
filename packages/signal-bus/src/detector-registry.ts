import type { Logger, SignalDraft, SignalType, Subject } from "@wardline/schemas";
import { ConflictError, ValidationError, errorMessage, silentLogger } from "@wardline/schemas";
import type { PublishReceipt, SignalBus } from "./signal-bus.js";

/** Raw platform activity handed to detectors. */
export interface Observation {
  kind: string;
  subject: Subject;
  data: Record<string, unknown>;
}

export interface Detector {
  name: string;
  produces: readonly SignalType[];
  inspect(observation: Observation): SignalDraft[] | Promise<SignalDraft[]>;
}

export interface DetectorRejection {
  detector: string;
  error: string;
}

export interface ObserveResult {
  published: PublishReceipt[];
  rejected: DetectorRejection[];
}

/**
 * Static detector registration. Detectors are plain objects registered
 * at startup; each observation runs through all of them and their drafts
 * are published with the detector's name as the source.
 */
export class DetectorRegistry {
  private detectors = new Map<string, Detector>();
  private bus: SignalBus;
  private logger: Logger;

  constructor(bus: SignalBus, options?: { logger?: Logger }) {
    this.bus = bus;
    this.logger = options?.logger ?? silentLogger;
  }

  register(detector: Detector): void {
    if (this.detectors.has(detector.name)) {
      throw new ConflictError(`Detector "${detector.name}" is already registered`);
    }
    if (detector.produces.length === 0) {
      throw new ValidationError(`Detector "${detector.name}" declares no signal types`);
    }
    this.detectors.set(detector.name, detector);
    this.logger.info(`registered detector ${detector.name}`, { produces: [...detector.produces] });
  }

  unregister(name: string): boolean {
    return this.detectors.delete(name);
  }

  list(): Array<{ name: string; produces: SignalType[] }> {
    return [...this.detectors.values()].map((d) => ({ name: d.name, produces: [...d.produces] }));
  }

  async observe(observation: Observation): Promise<ObserveResult> {
    const result: ObserveResult = { published: [], rejected: [] };
    for (const detector of this.detectors.values()) {
      let drafts: SignalDraft[];
      try {
        drafts = await detector.inspect(observation);
      } catch (err) {
        this.reject(result, detector.name, `inspect failed: ${errorMessage(err)}`);
        continue;
      }
      for (const draft of drafts) {
        try {
          if (!detector.produces.includes(draft.type)) {
            throw new ValidationError(`Detector "${detector.name}" may not produce ${draft.type}`);
          }
          result.published.push(await this.bus.publishDraft(draft, detector.name));
        } catch (err) {
          this.reject(result, detector.name, errorMessage(err));
        }
      }
    }
    return result;
  }

  private reject(result: ObserveResult, detector: string, error: string): void {
    this.logger.warn(`detector ${detector} rejected`, { error });
    result.rejected.push({ detector, error });
  }
}

/** Relays member joins so blacklist enforcement can see them. */
export const memberJoinDetector: Detector = {
  name: "member-join",
  produces: ["MEMBER_JOINED"],
  inspect(observation) {
    if (observation.kind !== "member_joined" || observation.subject.kind !== "user") return [];
    const guildId = observation.data["guild_id"];
    if (typeof guildId !== "string" || guildId.length === 0) return [];
    const payload: Record<string, unknown> = { guild_id: guildId };
    const createdAt = observation.data["account_created_at"];
    if (typeof createdAt === "string") payload["account_created_at"] = createdAt;
    return [
      {
        type: "MEMBER_JOINED",
        subject: { kind: "user", value: observation.subject.value },
        severity: "low",
        confidence: 1,
        payload,
      },
    ];
  },
};
