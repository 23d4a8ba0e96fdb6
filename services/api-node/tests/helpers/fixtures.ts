import { expect } from "vitest";
import type { CreateGroupInput } from "@chamapool/shared";
import type { GroupEngine } from "../../src/domain/engine.js";
import { GroupRegistry, type RegistryLimits } from "../../src/domain/registry.js";
import { CustodyLedger } from "../../src/providers/custodyLedger.js";
import { HttpError } from "../../src/utils/errors.js";
import { ManualClock, ONE_DAY, ONE_WEEK } from "../../src/utils/time.js";

export const START = 1_800_000_000;
export const CONTRIBUTION = 1000;
export const FUNDING = 100_000;
export const REGISTRY_OWNER = "registry-owner";

export function groupInput(overrides: Partial<CreateGroupInput> = {}): CreateGroupInput {
  return {
    name: "Harambee Circle",
    contributionAmount: CONTRIBUTION,
    contributionFrequency: "weekly",
    maxMembers: 5,
    startDate: START,
    endDate: START + 10 * ONE_WEEK,
    punishmentMode: "None",
    approvalRequired: false,
    emergencyWithdrawAllowed: false,
    gracePeriod: ONE_DAY,
    contributionWindow: 2 * ONE_DAY,
    ...overrides,
  };
}

export interface HarnessOptions {
  creator?: string;
  members?: string[];
  group?: Partial<CreateGroupInput>;
  limits?: Partial<RegistryLimits>;
}

export interface Harness {
  clock: ManualClock;
  ledger: CustodyLedger;
  registry: GroupRegistry;
  group: GroupEngine;
}

/**
 * Creates a group one hour before START, funds and admits the members,
 * then moves the clock to START.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const creator = options.creator ?? "alice";
  const members = options.members ?? ["alice", "bob", "carol", "dave", "erin"];
  const clock = new ManualClock(START - 3600);
  const ledger = new CustodyLedger();
  const registry = new GroupRegistry({
    owner: REGISTRY_OWNER,
    clock,
    transfer: ledger,
    limits: options.limits,
  });
  const group = registry.createGroup(creator, groupInput(options.group));
  clock.set(START);
  members.forEach((member) => {
    ledger.fund(member, FUNDING);
    group.join(member);
  });
  return { clock, ledger, registry, group };
}

export function contributeAll(group: GroupEngine, members: string[]): void {
  members.forEach((member) => group.contribute(member, { asset: "native", amount: CONTRIBUTION }));
}

/** Runs the action and returns the HttpError it throws. */
export function failure(action: () => unknown): HttpError {
  try {
    action();
  } catch (error) {
    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      return error;
    }
  }
  throw new Error("Expected the action to throw an HttpError");
}
