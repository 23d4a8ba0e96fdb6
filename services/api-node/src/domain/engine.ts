import {
  PROPOSAL_TYPES,
  PUNISHMENT_ACTIONS,
  type GroupEvent,
  type GroupEventRecord,
  type GroupRules,
  type GroupSummary,
  type MemberDetails,
  type Payment,
  type PayoutRecord,
  type ProposalDetails,
  type ProposalInput,
  type ProposalType,
  type PunishmentAction,
  type PunishmentDetails,
  type Timestamp,
} from "@chamapool/shared";
import type { ValueTransfer } from "../providers/custodyLedger.js";
import { hashValue } from "../utils/crypto.js";
import { ensure, fail } from "../utils/errors.js";
import { ONE_DAY, ONE_WEEK, contributionDeadline, periodIndex, periodStart, type Clock } from "../utils/time.js";

export interface EngineSettings {
  periodDuration: number;
  proposalDuration: number;
  quorumPercent: number;
  maxMissedContributions: number;
  fineEscalationThreshold: number;
  finePercent: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  periodDuration: ONE_WEEK,
  proposalDuration: 3 * ONE_DAY,
  quorumPercent: 50,
  maxMissedContributions: 2,
  fineEscalationThreshold: 3,
  finePercent: 10,
};

export const ZERO_IDENTITY = "0x0000000000000000000000000000000000000000";

export function isZeroIdentity(identity: string): boolean {
  return identity.trim().length === 0 || identity.toLowerCase() === ZERO_IDENTITY;
}

export function requiredVotes(activeMemberCount: number, quorumPercent: number): number {
  return Math.ceil((activeMemberCount * quorumPercent) / 100);
}

export interface GroupEngineOptions {
  id: string;
  rules: GroupRules;
  creator: string;
  clock: Clock;
  transfer: ValueTransfer;
  settings?: Partial<EngineSettings>;
  /** Receives each event once its operation has fully applied. */
  onEvent?: (event: GroupEventRecord) => void;
}

interface MemberState extends MemberDetails {
  nextPeriodToCheck: number;
  /** Set on leave or kick; an exited member is never reactivated. */
  hasExited: boolean;
}

interface ProposalState {
  id: number;
  proposalType: ProposalType;
  target: string;
  value: number;
  description: string;
  votesFor: number;
  votesAgainst: number;
  createdAt: Timestamp;
  executed: boolean;
}

interface GroupState {
  creator: string;
  admins: Set<string>;
  isActive: boolean;
  paused: boolean;
  memberCount: number;
  activeMemberCount: number;
  totalFunds: number;
  members: Map<string, MemberState>;
  punishments: Map<string, PunishmentDetails>;
  joinRequests: Set<string>;
  contributions: Map<string, Map<number, Timestamp>>;
  proposalCount: number;
  proposals: Map<number, ProposalState>;
  votes: Map<number, Set<string>>;
  payouts: Map<number, PayoutRecord>;
  payoutHistory: Map<string, number[]>;
  payoutQueue: string[];
  payoutQueueSet: boolean;
  skippedPayouts: number;
  events: GroupEventRecord[];
}

/**
 * State machine for a single rotating-savings group.
 *
 * Every mutating operation is atomic: the state is snapshotted before the
 * operation runs and restored if anything throws, including a failed value
 * transfer. Transfers are issued only after the operation's state changes,
 * and the engine rejects any mutating call made while another is in flight.
 */
export class GroupEngine {
  readonly id: string;
  readonly rules: Readonly<GroupRules>;
  readonly settings: Readonly<EngineSettings>;
  readonly fineAmount: number;
  private state: GroupState;
  private clock: Clock;
  private transfer: ValueTransfer;
  private onEvent?: (event: GroupEventRecord) => void;
  private entered = false;

  constructor(options: GroupEngineOptions) {
    this.id = options.id;
    this.rules = Object.freeze({ ...options.rules });
    this.settings = Object.freeze({ ...DEFAULT_ENGINE_SETTINGS, ...options.settings });
    this.fineAmount = Math.floor((this.rules.contributionAmount * this.settings.finePercent) / 100);
    this.clock = options.clock;
    this.transfer = options.transfer;
    this.onEvent = options.onEvent;
    this.state = {
      creator: options.creator,
      admins: new Set([options.creator]),
      isActive: true,
      paused: false,
      memberCount: 0,
      activeMemberCount: 0,
      totalFunds: 0,
      members: new Map(),
      punishments: new Map(),
      joinRequests: new Set(),
      contributions: new Map(),
      proposalCount: 0,
      proposals: new Map(),
      votes: new Map(),
      payouts: new Map(),
      payoutHistory: new Map(),
      payoutQueue: [],
      payoutQueueSet: false,
      skippedPayouts: 0,
      events: [],
    };
  }

  // Membership & admin

  join(caller: string): "joined" | "requested" {
    return this.mutate(() => {
      this.whenNotPaused();
      ensure(!this.state.members.get(caller)?.exists, "integrity", "ALREADY_MEMBER", "Already a member");
      this.assertWithinDates();
      ensure(!this.hasActivePunishment(caller), "precondition", "ACTIVE_PUNISHMENT", "Caller has an active punishment");
      ensure(this.state.memberCount < this.rules.maxMembers, "capacity", "GROUP_FULL", "Group is full");

      if (this.rules.approvalRequired) {
        ensure(
          !this.state.joinRequests.has(caller),
          "integrity",
          "JOIN_REQUEST_PENDING",
          "Join request already pending"
        );
        this.state.joinRequests.add(caller);
        this.emit({ type: "JoinRequested", member: caller });
        return "requested";
      }

      this.admit(caller);
      return "joined";
    });
  }

  approveJoin(caller: string, user: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      this.assertGroupActive();
      ensure(this.state.joinRequests.has(user), "integrity", "REQUEST_NOT_FOUND", "No pending join request", 404);
      ensure(this.state.memberCount < this.rules.maxMembers, "capacity", "GROUP_FULL", "Group is full");
      this.state.joinRequests.delete(user);
      this.admit(user);
      this.emit({ type: "JoinApproved", member: user, approvedBy: caller });
    });
  }

  rejectJoin(caller: string, user: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      ensure(this.state.joinRequests.has(user), "integrity", "REQUEST_NOT_FOUND", "No pending join request", 404);
      this.state.joinRequests.delete(user);
      this.emit({ type: "JoinRejected", member: user, rejectedBy: caller });
    });
  }

  /** Returns the refund paid to the leaving member. */
  leave(caller: string): number {
    return this.mutate(() => {
      this.whenNotPaused();
      const member = this.assertActiveMember(caller);
      ensure(
        !this.hasActivePunishment(caller),
        "precondition",
        "ACTIVE_PUNISHMENT",
        "Cannot leave with active punishment"
      );

      const owed = member.hasReceivedPayout
        ? 0
        : Math.max(0, member.totalContributed - member.missedContributions * this.fineAmount);
      const refund = Math.min(owed, this.state.totalFunds);

      this.deactivate(member);
      member.hasExited = true;
      this.state.totalFunds -= refund;
      this.emit({ type: "MemberLeft", member: caller, refund });
      if (refund > 0) {
        this.moveFunds(this.id, caller, refund, "leave-refund");
      }
      return refund;
    });
  }

  addAdmin(caller: string, user: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      ensure(caller === this.state.creator, "authorization", "ONLY_CREATOR", "Only creator can add admins");
      ensure(!isZeroIdentity(user), "integrity", "INVALID_ADDRESS", "Invalid address", 400);
      this.state.admins.add(user);
      this.emit({ type: "AdminAdded", admin: user });
    });
  }

  removeAdmin(caller: string, user: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      ensure(caller === this.state.creator, "authorization", "ONLY_CREATOR", "Only creator can remove admins");
      ensure(user !== this.state.creator, "integrity", "CANNOT_REMOVE_CREATOR", "Cannot remove creator");
      this.state.admins.delete(user);
      this.emit({ type: "AdminRemoved", admin: user });
    });
  }

  transferCreator(caller: string, newCreator: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      ensure(caller === this.state.creator, "authorization", "ONLY_CREATOR", "Only creator");
      ensure(!isZeroIdentity(newCreator), "integrity", "INVALID_ADDRESS", "Invalid address", 400);
      ensure(newCreator !== this.state.creator, "integrity", "ALREADY_CREATOR", "Already the creator");
      const previousCreator = this.state.creator;
      this.state.creator = newCreator;
      this.state.admins.add(newCreator);
      this.emit({ type: "CreatorTransferred", previousCreator, newCreator });
    });
  }

  // Contributions

  contribute(caller: string, payment: Payment): ContributionReceipt {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertActiveMember(caller);
      this.assertWithinDates();
      const period = this.getCurrentPeriod();
      ensure(
        this.getContributionTimestamp(caller, period) === 0,
        "integrity",
        "ALREADY_CONTRIBUTED",
        "Already contributed this period"
      );
      this.assertPayment(payment, this.rules.contributionAmount, "INCORRECT_AMOUNT", "Incorrect contribution amount");
      ensure(this.isContributionWindowOpen(), "precondition", "WINDOW_CLOSED", "Contribution window closed");

      const missedDetected = this.detectMissedContributions(caller);

      const member = this.requireMemberState(caller);
      const timestamp = this.clock.now();
      this.contributionsOf(caller).set(period, timestamp);
      member.totalContributed += payment.amount;
      this.state.totalFunds += payment.amount;
      this.emit({ type: "ContributionMade", member: caller, amount: payment.amount, period, contributedAt: timestamp });
      this.moveFunds(caller, this.id, payment.amount, `contribution:${period}`);
      return { period, timestamp, missedDetected };
    });
  }

  /**
   * Admin-triggered missed-contribution check. Without a user, every active
   * member is checked. Returns the number of missed periods found.
   */
  checkMissedContributions(caller: string, user?: string): number {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      if (user !== undefined) {
        this.requireMemberState(user);
        return this.detectMissedContributions(user);
      }
      let detected = 0;
      for (const [identity, member] of this.state.members) {
        if (member.isActive) {
          detected += this.detectMissedContributions(identity);
        }
      }
      return detected;
    });
  }

  // Punishments

  punishMember(caller: string, user: string, action: PunishmentAction, reason: string): PunishmentAction {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      const member = this.requireMemberState(user);
      ensure(!member.hasExited, "precondition", "MEMBER_EXITED", "Member has left the group");
      ensure(
        PUNISHMENT_ACTIONS.includes(action) && action !== "None",
        "integrity",
        "INVALID_ACTION",
        "Invalid punishment action",
        400
      );
      const existing = this.state.punishments.get(user);
      ensure(
        !(existing?.isActive && existing.action === "Ban"),
        "integrity",
        "ALREADY_BANNED",
        "Member is already banned"
      );
      return this.applyPunishment(user, action, reason);
    });
  }

  payFine(caller: string, payment: Payment): void {
    this.mutate(() => {
      this.whenNotPaused();
      const member = this.requireMemberState(caller);
      const punishment = this.state.punishments.get(caller);
      ensure(
        punishment?.isActive && punishment.action === "Fine",
        "precondition",
        "NO_ACTIVE_FINE",
        "No active fine"
      );
      this.assertPayment(payment, punishment.fineAmount, "INCORRECT_FINE_AMOUNT", "Incorrect fine amount");

      punishment.isActive = false;
      member.consecutiveFines = 0;
      this.state.totalFunds += payment.amount;
      this.emit({ type: "FineCollected", member: caller, amount: payment.amount });
      this.moveFunds(caller, this.id, payment.amount, "fine");
    });
  }

  cancelPunishment(caller: string, user: string): void {
    this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      this.requireMemberState(user);
      this.clearPunishment(user);
    });
  }

  // Governance

  createProposal(caller: string, input: ProposalInput): number {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertActiveMember(caller);
      ensure(PROPOSAL_TYPES.includes(input.proposalType), "integrity", "INVALID_PROPOSAL_TYPE", "Invalid proposal type", 400);
      ensure(!isZeroIdentity(input.target), "integrity", "INVALID_ADDRESS", "Invalid address", 400);

      this.state.proposalCount += 1;
      const id = this.state.proposalCount;
      this.state.proposals.set(id, {
        id,
        proposalType: input.proposalType,
        target: input.target,
        value: input.value ?? 0,
        description: input.description,
        votesFor: 0,
        votesAgainst: 0,
        createdAt: this.clock.now(),
        executed: false,
      });
      this.state.votes.set(id, new Set());
      this.emit({
        type: "ProposalCreated",
        proposalId: id,
        proposalType: input.proposalType,
        target: input.target,
        proposer: caller,
      });
      return id;
    });
  }

  voteOnProposal(caller: string, proposalId: number, support: boolean): void {
    this.mutate(() => {
      this.whenNotPaused();
      this.assertActiveMember(caller);
      const proposal = this.requireProposal(proposalId);
      ensure(!proposal.executed, "integrity", "ALREADY_EXECUTED", "Proposal already executed");
      ensure(
        this.clock.now() <= this.votingEndsAt(proposal),
        "precondition",
        "VOTING_CLOSED",
        "Voting period over"
      );
      const voters = this.votersOf(proposalId);
      ensure(!voters.has(caller), "integrity", "ALREADY_VOTED", "Already voted");

      voters.add(caller);
      if (support) {
        proposal.votesFor += 1;
      } else {
        proposal.votesAgainst += 1;
      }
    });
  }

  executeProposal(caller: string, proposalId: number): void {
    this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      const proposal = this.requireProposal(proposalId);
      ensure(!proposal.executed, "integrity", "ALREADY_EXECUTED", "Proposal already executed");
      ensure(
        this.clock.now() > this.votingEndsAt(proposal),
        "precondition",
        "VOTING_ACTIVE",
        "Voting still active"
      );
      const needed = requiredVotes(this.state.activeMemberCount, this.settings.quorumPercent);
      ensure(
        proposal.votesFor + proposal.votesAgainst >= needed,
        "precondition",
        "INSUFFICIENT_PARTICIPATION",
        "Insufficient participation"
      );
      ensure(proposal.votesFor > proposal.votesAgainst, "precondition", "PROPOSAL_REJECTED", "Proposal rejected");

      this.applyProposal(proposal);
      proposal.executed = true;
      this.emit({
        type: "ProposalExecuted",
        proposalId: proposal.id,
        proposalType: proposal.proposalType,
        target: proposal.target,
      });
    });
  }

  // Payout rotation

  setPayoutQueue(caller: string, queue: string[]): void {
    this.mutate(() => {
      this.whenNotPaused();
      ensure(caller === this.state.creator, "authorization", "ONLY_CREATOR", "Only creator");
      ensure(!this.state.payoutQueueSet, "integrity", "QUEUE_ALREADY_SET", "Payout queue already set");
      ensure(queue.length > 0, "capacity", "EMPTY_QUEUE", "Payout queue cannot be empty");
      ensure(
        queue.length === this.state.memberCount,
        "capacity",
        "INVALID_QUEUE_LENGTH",
        "Queue length must equal member count"
      );
      queue.forEach((entry) => {
        ensure(this.state.members.get(entry)?.exists, "capacity", "INVALID_QUEUE_MEMBER", "Queue entry is not a member");
      });
      ensure(new Set(queue).size === queue.length, "capacity", "DUPLICATE_QUEUE_MEMBER", "Queue entries must be unique");

      this.state.payoutQueue = [...queue];
      this.state.payoutQueueSet = true;
      this.emit({ type: "PayoutQueueSet", queue: [...queue] });
    });
  }

  processRotationPayout(caller: string): PayoutRecord {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      this.assertGroupActive();
      const period = this.getCurrentPeriod();
      ensure(!this.state.payouts.has(period), "integrity", "PAYOUT_EXISTS", "Payout already processed for this period");
      ensure(this.state.payoutQueueSet, "capacity", "QUEUE_NOT_SET", "Payout queue not set");

      const queue = this.state.payoutQueue;
      queue.forEach((entry) => {
        if (this.isEligible(entry)) {
          ensure(
            this.getContributionTimestamp(entry, period) > 0,
            "precondition",
            "MEMBER_NOT_CONTRIBUTED",
            "Member has not contributed yet"
          );
        }
      });

      const nominalIndex = modulo(period - this.state.skippedPayouts, queue.length);
      let recipient = queue[nominalIndex];
      let wasSkipped = false;
      if (!this.isEligible(recipient)) {
        wasSkipped = true;
        const next = this.nextEligibleAfter(nominalIndex);
        ensure(next !== undefined, "precondition", "NO_ELIGIBLE_RECIPIENTS", "No eligible recipients");
        recipient = next;
      }

      const amount = this.rules.contributionAmount * this.state.activeMemberCount;
      ensure(amount <= this.state.totalFunds, "capacity", "INSUFFICIENT_POOL_FUNDS", "Insufficient pool funds");

      if (wasSkipped) {
        this.state.skippedPayouts += 1;
      }
      this.state.totalFunds -= amount;
      const record: PayoutRecord = { period, recipient, amount, timestamp: this.clock.now(), wasSkipped };
      this.state.payouts.set(period, record);
      const history = this.state.payoutHistory.get(recipient) ?? [];
      history.push(period);
      this.state.payoutHistory.set(recipient, history);
      this.requireMemberState(recipient).hasReceivedPayout = true;
      this.emit({ type: "PayoutProcessed", recipient, amount, period, wasSkipped });
      this.moveFunds(this.id, recipient, amount, `payout:${period}`);
      return { ...record };
    });
  }

  // Emergency & pause

  triggerEmergencyWithdraw(caller: string): number {
    return this.mutate(() => {
      this.whenNotPaused();
      this.assertAdmin(caller);
      ensure(
        this.rules.emergencyWithdrawAllowed,
        "precondition",
        "EMERGENCY_WITHDRAW_DISABLED",
        "Emergency withdraw not allowed"
      );
      const total = this.state.totalFunds;
      ensure(total > 0, "precondition", "NO_FUNDS", "No funds to withdraw");

      const recipients = [...this.state.members]
        .filter(([, member]) => member.isActive)
        .map(([identity]) => identity);
      const share = recipients.length > 0 ? Math.floor(total / recipients.length) : 0;
      const remainder = total - share * recipients.length;

      this.state.totalFunds = 0;
      this.state.isActive = false;
      this.emit({ type: "EmergencyWithdrawal", triggeredBy: caller, amount: total });
      if (share > 0) {
        recipients.forEach((identity) => this.moveFunds(this.id, identity, share, "emergency-withdraw"));
      }
      if (remainder > 0) {
        this.moveFunds(this.id, caller, remainder, "emergency-withdraw-remainder");
      }
      return total;
    });
  }

  pause(caller: string): void {
    this.mutate(() => {
      this.assertAdmin(caller);
      ensure(!this.state.paused, "precondition", "ALREADY_PAUSED", "Group is already paused");
      this.state.paused = true;
      this.emit({ type: "Paused", by: caller });
    });
  }

  unpause(caller: string): void {
    this.mutate(() => {
      this.assertAdmin(caller);
      ensure(this.state.paused, "precondition", "NOT_PAUSED", "Group is not paused");
      this.state.paused = false;
      this.emit({ type: "Unpaused", by: caller });
    });
  }

  // Queries

  getCurrentPeriod(): number {
    return periodIndex(this.rules.startDate, this.settings.periodDuration, this.clock.now());
  }

  isContributionWindowOpen(): boolean {
    const now = this.clock.now();
    if (now < this.rules.startDate || now > this.rules.endDate) {
      return false;
    }
    return now <= this.deadlineOf(this.getCurrentPeriod());
  }

  getContributionTimestamp(user: string, period: number): Timestamp {
    return this.state.contributions.get(user)?.get(period) ?? 0;
  }

  getContributionStatus(user: string, period: number): boolean {
    return this.getContributionTimestamp(user, period) > 0;
  }

  getMemberDetails(user: string): MemberDetails {
    const member = this.state.members.get(user);
    if (!member) {
      return {
        exists: false,
        isActive: false,
        joinedAt: 0,
        totalContributed: 0,
        missedContributions: 0,
        consecutiveFines: 0,
        hasReceivedPayout: false,
      };
    }
    return {
      exists: member.exists,
      isActive: member.isActive,
      joinedAt: member.joinedAt,
      totalContributed: member.totalContributed,
      missedContributions: member.missedContributions,
      consecutiveFines: member.consecutiveFines,
      hasReceivedPayout: member.hasReceivedPayout,
    };
  }

  getPunishmentDetails(user: string): PunishmentDetails {
    const punishment = this.state.punishments.get(user);
    return punishment ? { ...punishment } : { action: "None", reason: "", isActive: false, issuedAt: 0, fineAmount: 0 };
  }

  getProposal(proposalId: number): ProposalDetails {
    const proposal = this.requireProposal(proposalId);
    return { ...proposal, votingEndsAt: this.votingEndsAt(proposal) };
  }

  hasVoted(proposalId: number, voter: string): boolean {
    return this.state.votes.get(proposalId)?.has(voter) ?? false;
  }

  getPayoutInfo(period: number): PayoutRecord | undefined {
    const record = this.state.payouts.get(period);
    return record ? { ...record } : undefined;
  }

  getMemberPayoutHistory(user: string): number[] {
    return [...(this.state.payoutHistory.get(user) ?? [])];
  }

  getActiveMemberCount(): number {
    return this.state.activeMemberCount;
  }

  getMemberCount(): number {
    return this.state.memberCount;
  }

  getBalance(): number {
    return this.state.totalFunds;
  }

  getPayoutQueue(): string[] {
    return [...this.state.payoutQueue];
  }

  getPendingJoinRequests(): string[] {
    return [...this.state.joinRequests];
  }

  getSkippedPayouts(): number {
    return this.state.skippedPayouts;
  }

  getCreator(): string {
    return this.state.creator;
  }

  isAdmin(user: string): boolean {
    return this.state.admins.has(user);
  }

  isPaused(): boolean {
    return this.state.paused;
  }

  isGroupActive(): boolean {
    return this.state.isActive;
  }

  getEvents(type?: GroupEvent["type"]): GroupEventRecord[] {
    return this.state.events.filter((event) => !type || event.type === type).map((event) => ({ ...event }));
  }

  /** Recomputes the event hash chain; false if any entry was altered. */
  verifyEventChain(): boolean {
    let previousHash = "GENESIS";
    return this.state.events.every((record) => {
      const { id: _id, groupId: _groupId, timestamp, previousHash: recorded, entryHash, ...event } = record;
      const ok = recorded === previousHash && entryHash === this.hashEvent(previousHash, timestamp, event);
      previousHash = entryHash;
      return ok;
    });
  }

  getSummary(): GroupSummary {
    return {
      id: this.id,
      rules: { ...this.rules },
      creator: this.state.creator,
      admins: [...this.state.admins],
      isActive: this.state.isActive,
      paused: this.state.paused,
      memberCount: this.state.memberCount,
      activeMemberCount: this.state.activeMemberCount,
      totalFunds: this.state.totalFunds,
      fineAmount: this.fineAmount,
      currentPeriod: this.getCurrentPeriod(),
      contributionWindowOpen: this.isContributionWindowOpen(),
      skippedPayouts: this.state.skippedPayouts,
      payoutQueue: [...this.state.payoutQueue],
      proposalCount: this.state.proposalCount,
    };
  }

  // Internals

  private mutate<T>(operation: () => T): T {
    ensure(!this.entered, "integrity", "REENTRANT_CALL", "Group is already processing an operation");
    this.entered = true;
    const snapshot = structuredClone(this.state);
    const eventCount = this.state.events.length;
    let result: T;
    try {
      result = operation();
    } catch (error) {
      this.state = snapshot;
      throw error;
    } finally {
      this.entered = false;
    }
    this.state.events.slice(eventCount).forEach((event) => this.onEvent?.({ ...event }));
    return result;
  }

  /** Single exit point for value; callers finish their state changes first. */
  private moveFunds(from: string, to: string, amount: number, memo: string): void {
    this.transfer.transfer({ asset: this.rules.contributionAsset, from, to, amount, memo: `${this.id}:${memo}` });
  }

  private admit(user: string): void {
    const now = this.clock.now();
    this.state.members.set(user, {
      exists: true,
      isActive: true,
      joinedAt: now,
      totalContributed: 0,
      missedContributions: 0,
      consecutiveFines: 0,
      hasReceivedPayout: false,
      nextPeriodToCheck: this.firstPeriodToCheck(),
      hasExited: false,
    });
    this.state.memberCount += 1;
    this.state.activeMemberCount += 1;
    this.emit({ type: "MemberJoined", member: user });
  }

  private deactivate(member: MemberState): void {
    if (member.isActive) {
      member.isActive = false;
      this.state.activeMemberCount -= 1;
    }
  }

  private reactivate(member: MemberState): void {
    if (!member.isActive) {
      member.isActive = true;
      this.state.activeMemberCount += 1;
    }
    member.missedContributions = 0;
    member.consecutiveFines = 0;
    member.nextPeriodToCheck = this.firstPeriodToCheck();
  }

  /** The current period, or the next one once its deadline has passed. */
  private firstPeriodToCheck(): number {
    const period = this.getCurrentPeriod();
    return this.clock.now() <= this.deadlineOf(period) ? period : period + 1;
  }

  /**
   * Walks forward from the member's cursor over every period whose deadline
   * has passed, counting and punishing each period without a contribution.
   */
  private detectMissedContributions(user: string): number {
    const member = this.requireMemberState(user);
    const now = this.clock.now();
    let detected = 0;
    while (member.isActive) {
      const period = member.nextPeriodToCheck;
      if (periodStart(this.rules.startDate, this.settings.periodDuration, period) >= this.rules.endDate) {
        break;
      }
      if (now <= this.deadlineOf(period)) {
        break;
      }
      member.nextPeriodToCheck = period + 1;
      if (this.getContributionTimestamp(user, period) > 0) {
        continue;
      }
      member.missedContributions += 1;
      detected += 1;
      this.emit({ type: "MissedContributionDetected", member: user, period });
      if (member.missedContributions > this.settings.maxMissedContributions && this.rules.punishmentMode !== "None") {
        this.applyPunishment(user, this.rules.punishmentMode, `Missed contribution for period ${period}`);
      }
    }
    return detected;
  }

  /** Records a punishment, escalating repeated fines to a ban under Fine mode. */
  private applyPunishment(user: string, requested: PunishmentAction, reason: string): PunishmentAction {
    const member = this.requireMemberState(user);
    let action = requested;
    let recordedReason = reason;
    if (this.rules.punishmentMode === "Fine" && requested === "Fine") {
      member.consecutiveFines += 1;
      if (member.consecutiveFines >= this.settings.fineEscalationThreshold) {
        action = "Ban";
        recordedReason = `${reason} (escalated after ${member.consecutiveFines} consecutive fines)`;
      }
    } else {
      member.consecutiveFines = 0;
    }

    this.state.punishments.set(user, {
      action,
      reason: recordedReason,
      isActive: true,
      issuedAt: this.clock.now(),
      fineAmount: action === "Fine" ? this.fineAmount : 0,
    });
    if (action === "Ban") {
      this.deactivate(member);
    }
    this.emit({ type: "MemberPunished", member: user, action, reason: recordedReason });
    return action;
  }

  private clearPunishment(user: string): void {
    const member = this.requireMemberState(user);
    const punishment = this.state.punishments.get(user);
    ensure(punishment?.isActive, "precondition", "NO_ACTIVE_PUNISHMENT", "No active punishment");
    punishment.isActive = false;
    if (punishment.action === "Ban" && !member.hasExited) {
      this.reactivate(member);
    }
    this.emit({ type: "PunishmentCancelled", member: user });
  }

  private applyProposal(proposal: ProposalState): void {
    const target = proposal.target;
    switch (proposal.proposalType) {
      case "CancelPunishment":
        this.requireMemberState(target);
        this.clearPunishment(target);
        return;
      case "AddAdmin":
        this.state.admins.add(target);
        this.emit({ type: "AdminAdded", admin: target });
        return;
      case "RemoveAdmin":
        ensure(target !== this.state.creator, "integrity", "CANNOT_REMOVE_CREATOR", "Cannot remove creator");
        this.state.admins.delete(target);
        this.emit({ type: "AdminRemoved", admin: target });
        return;
      case "KickMember": {
        const member = this.requireMemberState(target);
        ensure(member.isActive, "precondition", "MEMBER_NOT_ACTIVE", "Member is not active");
        this.deactivate(member);
        member.hasExited = true;
        return;
      }
      default: {
        const unknownType: never = proposal.proposalType;
        throw fail("integrity", "INVALID_PROPOSAL_TYPE", `Unsupported proposal type ${String(unknownType)}`, 400);
      }
    }
  }

  private nextEligibleAfter(index: number): string | undefined {
    const queue = this.state.payoutQueue;
    for (let offset = 1; offset < queue.length; offset += 1) {
      const candidate = queue[(index + offset) % queue.length];
      if (this.isEligible(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private isEligible(user: string): boolean {
    const member = this.state.members.get(user);
    return Boolean(member?.isActive) && !this.hasActivePunishment(user);
  }

  private hasActivePunishment(user: string): boolean {
    return this.state.punishments.get(user)?.isActive ?? false;
  }

  private deadlineOf(period: number): Timestamp {
    return contributionDeadline(
      this.rules.startDate,
      this.settings.periodDuration,
      period,
      this.rules.contributionWindow,
      this.rules.gracePeriod
    );
  }

  private votingEndsAt(proposal: ProposalState): Timestamp {
    return proposal.createdAt + this.settings.proposalDuration;
  }

  private contributionsOf(user: string): Map<number, Timestamp> {
    let periods = this.state.contributions.get(user);
    if (!periods) {
      periods = new Map();
      this.state.contributions.set(user, periods);
    }
    return periods;
  }

  private votersOf(proposalId: number): Set<string> {
    let voters = this.state.votes.get(proposalId);
    if (!voters) {
      voters = new Set();
      this.state.votes.set(proposalId, voters);
    }
    return voters;
  }

  private requireMemberState(user: string): MemberState {
    const member = this.state.members.get(user);
    ensure(member?.exists, "integrity", "NOT_MEMBER", "Not a member", 404);
    return member;
  }

  private requireProposal(proposalId: number): ProposalState {
    const proposal = this.state.proposals.get(proposalId);
    ensure(proposal, "integrity", "PROPOSAL_NOT_FOUND", "Proposal not found", 404);
    return proposal;
  }

  private assertActiveMember(user: string): MemberState {
    const member = this.state.members.get(user);
    ensure(member?.isActive, "authorization", "NOT_ACTIVE_MEMBER", "Not an active member");
    return member;
  }

  private assertAdmin(user: string): void {
    ensure(this.state.admins.has(user), "authorization", "NOT_ADMIN", "Not admin");
  }

  private assertGroupActive(): void {
    ensure(this.state.isActive, "precondition", "GROUP_INACTIVE", "Group is not active");
  }

  private assertWithinDates(): void {
    this.assertGroupActive();
    const now = this.clock.now();
    ensure(now >= this.rules.startDate, "precondition", "GROUP_NOT_STARTED", "Group has not started");
    ensure(now <= this.rules.endDate, "precondition", "GROUP_ENDED", "Group has ended");
  }

  private whenNotPaused(): void {
    ensure(!this.state.paused, "precondition", "GROUP_PAUSED", "Group is paused");
  }

  private assertPayment(payment: Payment, expected: number, code: string, message: string): void {
    ensure(
      payment.asset === this.rules.contributionAsset,
      "value_mismatch",
      "INCORRECT_ASSET",
      "Payment asset does not match the group's contribution asset"
    );
    ensure(payment.amount === expected, "value_mismatch", code, message);
  }

  private emit(event: GroupEvent): void {
    const previousHash = this.state.events.at(-1)?.entryHash ?? "GENESIS";
    const timestamp = this.clock.now();
    this.state.events.push({
      ...event,
      id: this.state.events.length + 1,
      groupId: this.id,
      timestamp,
      previousHash,
      entryHash: this.hashEvent(previousHash, timestamp, event),
    });
  }

  private hashEvent(previousHash: string, timestamp: Timestamp, event: object): string {
    return hashValue(`${previousHash}|${timestamp}|${this.id}|${JSON.stringify(event)}`);
  }
}

export interface ContributionReceipt {
  period: number;
  timestamp: Timestamp;
  missedDetected: number;
}

function modulo(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
