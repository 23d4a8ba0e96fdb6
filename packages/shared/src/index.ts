export const APP_NAME = "ChamaPool";

export const NATIVE_ASSET = "native";

export const PUNISHMENT_ACTIONS = ["None", "Warning", "Fine", "Ban"] as const;
export type PunishmentAction = (typeof PUNISHMENT_ACTIONS)[number];

export const PROPOSAL_TYPES = ["CancelPunishment", "AddAdmin", "RemoveAdmin", "KickMember"] as const;
export type ProposalType = (typeof PROPOSAL_TYPES)[number];

export const CONTRIBUTION_FREQUENCIES = ["weekly", "biweekly", "monthly"] as const;
export type ContributionFrequency = (typeof CONTRIBUTION_FREQUENCIES)[number];

export type FailureCategory = "authorization" | "precondition" | "value_mismatch" | "capacity" | "integrity";

/** Unix seconds. */
export type Timestamp = number;

export interface GroupRules {
  name: string;
  contributionAmount: number;
  contributionFrequency: ContributionFrequency;
  maxMembers: number;
  startDate: Timestamp;
  endDate: Timestamp;
  punishmentMode: PunishmentAction;
  approvalRequired: boolean;
  emergencyWithdrawAllowed: boolean;
  contributionAsset: string;
  gracePeriod: number;
  contributionWindow: number;
}

export interface CreateGroupInput {
  name: string;
  contributionAmount: number;
  contributionFrequency: ContributionFrequency;
  maxMembers: number;
  startDate: Timestamp;
  endDate: Timestamp;
  punishmentMode: PunishmentAction;
  approvalRequired: boolean;
  emergencyWithdrawAllowed: boolean;
  contributionAsset?: string;
  gracePeriod: number;
  contributionWindow: number;
}

export interface Payment {
  asset: string;
  amount: number;
}

export interface MemberDetails {
  exists: boolean;
  isActive: boolean;
  joinedAt: Timestamp;
  totalContributed: number;
  missedContributions: number;
  consecutiveFines: number;
  hasReceivedPayout: boolean;
}

export interface PunishmentDetails {
  action: PunishmentAction;
  reason: string;
  isActive: boolean;
  issuedAt: Timestamp;
  fineAmount: number;
}

export interface ProposalInput {
  proposalType: ProposalType;
  target: string;
  value?: number;
  description: string;
}

export interface ProposalDetails {
  id: number;
  proposalType: ProposalType;
  target: string;
  value: number;
  description: string;
  votesFor: number;
  votesAgainst: number;
  createdAt: Timestamp;
  votingEndsAt: Timestamp;
  executed: boolean;
}

export interface PayoutRecord {
  period: number;
  recipient: string;
  amount: number;
  timestamp: Timestamp;
  wasSkipped: boolean;
}

export type GroupEvent =
  | { type: "MemberJoined"; member: string }
  | { type: "MemberLeft"; member: string; refund: number }
  | { type: "JoinRequested"; member: string }
  | { type: "JoinApproved"; member: string; approvedBy: string }
  | { type: "JoinRejected"; member: string; rejectedBy: string }
  | { type: "ContributionMade"; member: string; amount: number; period: number; contributedAt: Timestamp }
  | { type: "MissedContributionDetected"; member: string; period: number }
  | { type: "MemberPunished"; member: string; action: PunishmentAction; reason: string }
  | { type: "PunishmentCancelled"; member: string }
  | { type: "FineCollected"; member: string; amount: number }
  | { type: "PayoutProcessed"; recipient: string; amount: number; period: number; wasSkipped: boolean }
  | { type: "EmergencyWithdrawal"; triggeredBy: string; amount: number }
  | { type: "AdminAdded"; admin: string }
  | { type: "AdminRemoved"; admin: string }
  | { type: "ProposalCreated"; proposalId: number; proposalType: ProposalType; target: string; proposer: string }
  | { type: "ProposalExecuted"; proposalId: number; proposalType: ProposalType; target: string }
  | { type: "CreatorTransferred"; previousCreator: string; newCreator: string }
  | { type: "PayoutQueueSet"; queue: string[] }
  | { type: "Paused"; by: string }
  | { type: "Unpaused"; by: string };

export type GroupEventType = GroupEvent["type"];

export type GroupEventRecord = GroupEvent & {
  id: number;
  groupId: string;
  timestamp: Timestamp;
  previousHash: string;
  entryHash: string;
};

export interface GroupSummary {
  id: string;
  rules: GroupRules;
  creator: string;
  admins: string[];
  isActive: boolean;
  paused: boolean;
  memberCount: number;
  activeMemberCount: number;
  totalFunds: number;
  fineAmount: number;
  currentPeriod: number;
  contributionWindowOpen: boolean;
  skippedPayouts: number;
  payoutQueue: string[];
  proposalCount: number;
}

export interface RegistrySummary {
  owner: string;
  paused: boolean;
  groupCount: number;
}
