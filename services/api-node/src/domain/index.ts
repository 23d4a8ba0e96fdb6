import type { GroupEventRecord } from "@chamapool/shared";
import { env } from "../config/env.js";
import { CustodyLedger } from "../providers/custodyLedger.js";
import { systemClock, type Clock } from "../utils/time.js";
import { GroupRegistry } from "./registry.js";

export interface DomainServices {
  registry: GroupRegistry;
  ledger: CustodyLedger;
  clock: Clock;
}

export function createServices(
  clock: Clock = systemClock,
  onEvent?: (event: GroupEventRecord) => void
): DomainServices {
  const ledger = new CustodyLedger({ openingBalance: env.SIMULATED_OPENING_BALANCE });
  const registry = new GroupRegistry({
    owner: env.REGISTRY_OWNER,
    clock,
    transfer: ledger,
    onEvent,
    limits: {
      minContribution: env.MIN_CONTRIBUTION,
      maxContribution: env.MAX_CONTRIBUTION,
      minMembers: env.MIN_MEMBERS,
      maxMembers: env.MAX_MEMBERS,
      maxGroupsPerCreator: env.MAX_GROUPS_PER_CREATOR,
      maxGroupDuration: env.MAX_GROUP_DURATION_SECONDS,
    },
    engineSettings: {
      periodDuration: env.PERIOD_DURATION_SECONDS,
      proposalDuration: env.PROPOSAL_DURATION_SECONDS,
      quorumPercent: env.QUORUM_PERCENT,
      maxMissedContributions: env.MAX_MISSED_CONTRIBUTIONS,
      fineEscalationThreshold: env.FINE_ESCALATION_THRESHOLD,
      finePercent: env.FINE_PERCENT,
    },
  });
  return { registry, ledger, clock };
}
