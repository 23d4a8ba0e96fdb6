import { Router } from "express";
import { z } from "zod";
import {
  CONTRIBUTION_FREQUENCIES,
  NATIVE_ASSET,
  PROPOSAL_TYPES,
  PUNISHMENT_ACTIONS,
} from "@chamapool/shared";
import { env } from "../config/env.js";
import type { DomainServices } from "../domain/index.js";
import { callerOf, requireAuth } from "../middleware/auth.js";
import { signIdentity } from "../utils/crypto.js";
import { HttpError } from "../utils/errors.js";
import { toIso } from "../utils/time.js";

const paymentSchema = z.object({
  asset: z.string().min(1).default(NATIVE_ASSET),
  amount: z.number().int().positive(),
});

const identitySchema = z.string().trim().min(1).max(128);

export function createV1Router({ registry, ledger, clock }: DomainServices): Router {
  const v1Router = Router();

  v1Router.get("/health", (_request, response) => {
    response.json({
      data: {
        service: "chamapool-api-node",
        status: "ok",
        timestamp: toIso(clock.now()),
      },
    });
  });

  v1Router.post("/auth/dev-token", (request, response) => {
    if (!env.EXPOSE_DEV_TOKENS) {
      throw new HttpError(404, "NOT_FOUND", "Route not found.");
    }
    const payload = z.object({ identity: identitySchema }).parse(request.body);
    response.status(201).json({ data: { accessToken: signIdentity(payload.identity, env.AUTH_SECRET) } });
  });

  v1Router.get("/wallet/balance", requireAuth, (request, response) => {
    const asset = z.string().min(1).default(NATIVE_ASSET).parse(asString(request.query.asset));
    const caller = callerOf(request);
    response.json({ data: { account: caller, asset, balance: ledger.balanceOf(caller, asset) } });
  });

  // Registry

  v1Router.get("/registry", (_request, response) => {
    response.json({ data: registry.summary() });
  });

  v1Router.post("/registry/pause", requireAuth, (request, response) => {
    registry.pause(callerOf(request));
    response.json({ data: registry.summary() });
  });

  v1Router.post("/registry/unpause", requireAuth, (request, response) => {
    registry.unpause(callerOf(request));
    response.json({ data: registry.summary() });
  });

  v1Router.get("/groups", (_request, response) => {
    response.json({ data: registry.listGroups().map((group) => group.getSummary()) });
  });

  v1Router.get("/groups/mine", requireAuth, (request, response) => {
    const data = registry.groupsByCreator(callerOf(request)).map((group) => group.getSummary());
    response.json({ data });
  });

  v1Router.post("/groups", requireAuth, (request, response) => {
    const payload = z
      .object({
        name: z.string().min(1).max(50),
        contributionAmount: z.number().int().positive(),
        contributionFrequency: z.enum(CONTRIBUTION_FREQUENCIES).default("weekly"),
        maxMembers: z.number().int().positive(),
        startDate: z.number().int().positive(),
        endDate: z.number().int().positive(),
        punishmentMode: z.enum(PUNISHMENT_ACTIONS).default("None"),
        approvalRequired: z.boolean().default(false),
        emergencyWithdrawAllowed: z.boolean().default(false),
        contributionAsset: z.string().min(1).optional(),
        gracePeriod: z.number().int().min(0),
        contributionWindow: z.number().int().positive(),
      })
      .parse(request.body);
    const group = registry.createGroup(callerOf(request), payload);
    response.status(201).json({ data: group.getSummary() });
  });

  v1Router.get("/groups/:groupId", (request, response) => {
    response.json({ data: registry.getGroup(request.params.groupId).getSummary() });
  });

  v1Router.get("/groups/:groupId/period", (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    response.json({
      data: {
        currentPeriod: group.getCurrentPeriod(),
        contributionWindowOpen: group.isContributionWindowOpen(),
      },
    });
  });

  v1Router.get("/groups/:groupId/events", (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    response.json({ data: group.getEvents(), meta: { chainValid: group.verifyEventChain() } });
  });

  // Membership & admin

  v1Router.post("/groups/:groupId/join", requireAuth, (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    const caller = callerOf(request);
    const outcome = group.join(caller);
    response.status(outcome === "joined" ? 201 : 202).json({
      data: { outcome, member: group.getMemberDetails(caller) },
    });
  });

  v1Router.get("/groups/:groupId/join-requests", (request, response) => {
    response.json({ data: registry.getGroup(request.params.groupId).getPendingJoinRequests() });
  });

  v1Router.post("/groups/:groupId/join-requests/:userId/decision", requireAuth, (request, response) => {
    const payload = z.object({ decision: z.enum(["approve", "reject"]) }).parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    if (payload.decision === "approve") {
      group.approveJoin(callerOf(request), request.params.userId);
    } else {
      group.rejectJoin(callerOf(request), request.params.userId);
    }
    response.json({ data: group.getMemberDetails(request.params.userId) });
  });

  v1Router.post("/groups/:groupId/leave", requireAuth, (request, response) => {
    const refund = registry.getGroup(request.params.groupId).leave(callerOf(request));
    response.json({ data: { refund } });
  });

  v1Router.post("/groups/:groupId/admins", requireAuth, (request, response) => {
    const payload = z.object({ user: identitySchema }).parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.addAdmin(callerOf(request), payload.user);
    response.status(201).json({ data: { admin: payload.user, isAdmin: group.isAdmin(payload.user) } });
  });

  v1Router.delete("/groups/:groupId/admins/:userId", requireAuth, (request, response) => {
    registry.getGroup(request.params.groupId).removeAdmin(callerOf(request), request.params.userId);
    response.status(204).send();
  });

  v1Router.post("/groups/:groupId/creator", requireAuth, (request, response) => {
    const payload = z.object({ newCreator: identitySchema }).parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.transferCreator(callerOf(request), payload.newCreator);
    response.json({ data: { creator: group.getCreator() } });
  });

  v1Router.get("/groups/:groupId/members/:userId", (request, response) => {
    response.json({ data: registry.getGroup(request.params.groupId).getMemberDetails(request.params.userId) });
  });

  // Contributions

  v1Router.post("/groups/:groupId/contributions", requireAuth, (request, response) => {
    const payment = paymentSchema.parse(request.body);
    const data = registry.getGroup(request.params.groupId).contribute(callerOf(request), payment);
    response.status(201).json({ data });
  });

  v1Router.get("/groups/:groupId/members/:userId/contributions/:period", (request, response) => {
    const period = z.coerce.number().int().min(0).parse(request.params.period);
    const timestamp = registry
      .getGroup(request.params.groupId)
      .getContributionTimestamp(request.params.userId, period);
    response.json({ data: { period, timestamp, contributed: timestamp > 0 } });
  });

  v1Router.post("/groups/:groupId/missed-contributions/check", requireAuth, (request, response) => {
    const payload = z.object({ user: identitySchema.optional() }).parse(request.body ?? {});
    const detected = registry
      .getGroup(request.params.groupId)
      .checkMissedContributions(callerOf(request), payload.user);
    response.json({ data: { detected } });
  });

  // Punishments

  v1Router.post("/groups/:groupId/punishments", requireAuth, (request, response) => {
    const payload = z
      .object({
        user: identitySchema,
        action: z.enum(PUNISHMENT_ACTIONS),
        reason: z.string().trim().min(1).max(280),
      })
      .parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.punishMember(callerOf(request), payload.user, payload.action, payload.reason);
    response.status(201).json({ data: group.getPunishmentDetails(payload.user) });
  });

  v1Router.delete("/groups/:groupId/punishments/:userId", requireAuth, (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    group.cancelPunishment(callerOf(request), request.params.userId);
    response.json({ data: group.getPunishmentDetails(request.params.userId) });
  });

  v1Router.get("/groups/:groupId/members/:userId/punishment", (request, response) => {
    response.json({ data: registry.getGroup(request.params.groupId).getPunishmentDetails(request.params.userId) });
  });

  v1Router.post("/groups/:groupId/fines/pay", requireAuth, (request, response) => {
    const payment = paymentSchema.parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.payFine(callerOf(request), payment);
    response.json({ data: group.getPunishmentDetails(callerOf(request)) });
  });

  // Governance

  v1Router.post("/groups/:groupId/proposals", requireAuth, (request, response) => {
    const payload = z
      .object({
        proposalType: z.enum(PROPOSAL_TYPES),
        target: identitySchema,
        value: z.number().int().min(0).optional(),
        description: z.string().max(500).default(""),
      })
      .parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    const proposalId = group.createProposal(callerOf(request), payload);
    response.status(201).json({ data: group.getProposal(proposalId) });
  });

  v1Router.get("/groups/:groupId/proposals/:proposalId", requireAuth, (request, response) => {
    const proposalId = z.coerce.number().int().positive().parse(request.params.proposalId);
    const group = registry.getGroup(request.params.groupId);
    response.json({
      data: group.getProposal(proposalId),
      meta: { hasVoted: group.hasVoted(proposalId, callerOf(request)) },
    });
  });

  v1Router.post("/groups/:groupId/proposals/:proposalId/votes", requireAuth, (request, response) => {
    const proposalId = z.coerce.number().int().positive().parse(request.params.proposalId);
    const payload = z.object({ support: z.boolean() }).parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.voteOnProposal(callerOf(request), proposalId, payload.support);
    response.status(201).json({ data: group.getProposal(proposalId) });
  });

  v1Router.post("/groups/:groupId/proposals/:proposalId/execute", requireAuth, (request, response) => {
    const proposalId = z.coerce.number().int().positive().parse(request.params.proposalId);
    const group = registry.getGroup(request.params.groupId);
    group.executeProposal(callerOf(request), proposalId);
    response.json({ data: group.getProposal(proposalId) });
  });

  // Payouts

  v1Router.put("/groups/:groupId/payout-queue", requireAuth, (request, response) => {
    const payload = z.object({ queue: z.array(identitySchema).min(1) }).parse(request.body);
    const group = registry.getGroup(request.params.groupId);
    group.setPayoutQueue(callerOf(request), payload.queue);
    response.json({ data: { queue: group.getPayoutQueue() } });
  });

  v1Router.post("/groups/:groupId/payouts/process", requireAuth, (request, response) => {
    const data = registry.getGroup(request.params.groupId).processRotationPayout(callerOf(request));
    response.status(201).json({ data });
  });

  v1Router.get("/groups/:groupId/payouts/:period", (request, response) => {
    const period = z.coerce.number().int().min(0).parse(request.params.period);
    const record = registry.getGroup(request.params.groupId).getPayoutInfo(period);
    if (!record) {
      throw new HttpError(404, "PAYOUT_NOT_FOUND", "No payout for this period.");
    }
    response.json({ data: record });
  });

  v1Router.get("/groups/:groupId/members/:userId/payouts", (request, response) => {
    const data = registry.getGroup(request.params.groupId).getMemberPayoutHistory(request.params.userId);
    response.json({ data });
  });

  // Emergency & pause

  v1Router.post("/groups/:groupId/emergency-withdraw", requireAuth, (request, response) => {
    const amount = registry.getGroup(request.params.groupId).triggerEmergencyWithdraw(callerOf(request));
    response.json({ data: { amount } });
  });

  v1Router.post("/groups/:groupId/pause", requireAuth, (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    group.pause(callerOf(request));
    response.json({ data: { paused: group.isPaused() } });
  });

  v1Router.post("/groups/:groupId/unpause", requireAuth, (request, response) => {
    const group = registry.getGroup(request.params.groupId);
    group.unpause(callerOf(request));
    response.json({ data: { paused: group.isPaused() } });
  });

  return v1Router;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
