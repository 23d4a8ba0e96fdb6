import { NATIVE_ASSET, type CreateGroupInput, type GroupEventRecord, type RegistrySummary } from "@chamapool/shared";
import type { ValueTransfer } from "../providers/custodyLedger.js";
import { uid } from "../utils/crypto.js";
import { ensure } from "../utils/errors.js";
import { ONE_YEAR, type Clock } from "../utils/time.js";
import { GroupEngine, isZeroIdentity, type EngineSettings } from "./engine.js";

export interface RegistryLimits {
  minContribution: number;
  maxContribution: number;
  minMembers: number;
  maxMembers: number;
  maxGroupsPerCreator: number;
  maxGroupDuration: number;
}

export const DEFAULT_REGISTRY_LIMITS: RegistryLimits = {
  minContribution: 100,
  maxContribution: 10_000_000,
  minMembers: 3,
  maxMembers: 100,
  maxGroupsPerCreator: 10,
  maxGroupDuration: ONE_YEAR,
};

export interface GroupRegistryOptions {
  owner: string;
  clock: Clock;
  transfer: ValueTransfer & { registerCustodyAccount?: (account: string) => void };
  limits?: Partial<RegistryLimits>;
  engineSettings?: Partial<EngineSettings>;
  onEvent?: (event: GroupEventRecord) => void;
}

/**
 * Creates group engines from validated parameters and keeps the
 * creator index. Engines trust what the registry hands them.
 */
export class GroupRegistry {
  readonly owner: string;
  readonly limits: Readonly<RegistryLimits>;
  private clock: Clock;
  private transfer: GroupRegistryOptions["transfer"];
  private engineSettings?: Partial<EngineSettings>;
  private onEvent?: (event: GroupEventRecord) => void;
  private groups = new Map<string, GroupEngine>();
  private byCreator = new Map<string, string[]>();
  private paused = false;

  constructor(options: GroupRegistryOptions) {
    this.owner = options.owner;
    this.clock = options.clock;
    this.transfer = options.transfer;
    this.limits = Object.freeze({ ...DEFAULT_REGISTRY_LIMITS, ...options.limits });
    this.engineSettings = options.engineSettings;
    this.onEvent = options.onEvent;
  }

  createGroup(creator: string, input: CreateGroupInput): GroupEngine {
    ensure(!this.paused, "precondition", "REGISTRY_PAUSED", "Registry is paused");
    ensure(!isZeroIdentity(creator), "integrity", "INVALID_ADDRESS", "Invalid address", 400);
    this.validate(creator, input);

    const id = uid("grp");
    const engine = new GroupEngine({
      id,
      creator,
      clock: this.clock,
      transfer: this.transfer,
      settings: this.engineSettings,
      onEvent: this.onEvent,
      rules: {
        name: input.name.trim(),
        contributionAmount: input.contributionAmount,
        contributionFrequency: input.contributionFrequency,
        maxMembers: input.maxMembers,
        startDate: input.startDate,
        endDate: input.endDate,
        punishmentMode: input.punishmentMode,
        approvalRequired: input.approvalRequired,
        emergencyWithdrawAllowed: input.emergencyWithdrawAllowed,
        contributionAsset: input.contributionAsset?.trim() || NATIVE_ASSET,
        gracePeriod: input.gracePeriod,
        contributionWindow: input.contributionWindow,
      },
    });
    this.transfer.registerCustodyAccount?.(id);
    this.groups.set(id, engine);
    this.byCreator.set(creator, [...(this.byCreator.get(creator) ?? []), id]);
    return engine;
  }

  getGroup(groupId: string): GroupEngine {
    const engine = this.groups.get(groupId);
    ensure(engine, "integrity", "GROUP_NOT_FOUND", "Group not found", 404);
    return engine;
  }

  listGroups(): GroupEngine[] {
    return [...this.groups.values()];
  }

  groupsByCreator(creator: string): GroupEngine[] {
    return (this.byCreator.get(creator) ?? []).map((groupId) => this.getGroup(groupId));
  }

  groupCount(): number {
    return this.groups.size;
  }

  isPaused(): boolean {
    return this.paused;
  }

  pause(caller: string): void {
    this.assertOwner(caller);
    ensure(!this.paused, "precondition", "ALREADY_PAUSED", "Registry is already paused");
    this.paused = true;
  }

  unpause(caller: string): void {
    this.assertOwner(caller);
    ensure(this.paused, "precondition", "NOT_PAUSED", "Registry is not paused");
    this.paused = false;
  }

  summary(): RegistrySummary {
    return { owner: this.owner, paused: this.paused, groupCount: this.groups.size };
  }

  private validate(creator: string, input: CreateGroupInput): void {
    const limits = this.limits;
    const now = this.clock.now();
    const name = input.name.trim();
    ensure(name.length >= 1 && name.length <= 50, "integrity", "INVALID_NAME", "Invalid name length", 400);
    ensure(
      Number.isInteger(input.contributionAmount) &&
        input.contributionAmount >= limits.minContribution &&
        input.contributionAmount <= limits.maxContribution,
      "integrity",
      "INVALID_CONTRIBUTION",
      "Invalid contribution amount",
      400
    );
    ensure(
      Number.isInteger(input.maxMembers) && input.maxMembers >= limits.minMembers && input.maxMembers <= limits.maxMembers,
      "integrity",
      "INVALID_MAX_MEMBERS",
      "Invalid max members",
      400
    );
    ensure(input.startDate > now, "integrity", "START_IN_PAST", "Start date must be in future", 400);
    ensure(input.endDate > input.startDate, "integrity", "INVALID_END_DATE", "End date must be after start date", 400);
    ensure(
      input.endDate <= now + limits.maxGroupDuration,
      "integrity",
      "DURATION_TOO_LONG",
      "Group duration too long",
      400
    );
    ensure(
      input.gracePeriod >= 0 && input.contributionWindow > 0,
      "integrity",
      "INVALID_WINDOW",
      "Invalid contribution window",
      400
    );
    ensure(
      (this.byCreator.get(creator)?.length ?? 0) < limits.maxGroupsPerCreator,
      "capacity",
      "TOO_MANY_GROUPS",
      "Too many groups for creator"
    );
  }

  private assertOwner(caller: string): void {
    ensure(caller === this.owner, "authorization", "NOT_OWNER", "Only registry owner");
  }
}
