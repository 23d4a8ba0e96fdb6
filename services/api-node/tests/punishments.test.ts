import { describe, expect, it } from "vitest";
import { FUNDING, createHarness, failure } from "./helpers/fixtures.js";

describe("punishments", () => {
  it("issues a fine worth ten percent of the contribution", () => {
    const { group } = createHarness({ group: { punishmentMode: "Fine" } });
    expect(group.fineAmount).toBe(100);
    expect(group.punishMember("alice", "bob", "Fine", "Late")).toBe("Fine");
    expect(group.getPunishmentDetails("bob")).toMatchObject({
      action: "Fine",
      reason: "Late",
      isActive: true,
      fineAmount: 100,
    });
    expect(group.getMemberDetails("bob").consecutiveFines).toBe(1);
  });

  it("collects the exact fine and clears the punishment", () => {
    const { group, ledger } = createHarness({ group: { punishmentMode: "Fine" } });
    group.punishMember("alice", "bob", "Fine", "Late");

    const wrong = failure(() => group.payFine("bob", { asset: "native", amount: 50 }));
    expect(wrong.code).toBe("INCORRECT_FINE_AMOUNT");
    expect(wrong.status).toBe(422);

    group.payFine("bob", { asset: "native", amount: 100 });
    expect(group.getPunishmentDetails("bob").isActive).toBe(false);
    expect(group.getMemberDetails("bob").consecutiveFines).toBe(0);
    expect(group.getBalance()).toBe(100);
    expect(ledger.balanceOf("bob")).toBe(FUNDING - 100);
    expect(group.getEvents("FineCollected")[0]).toMatchObject({ member: "bob", amount: 100 });
  });

  it("rejects fine payments when no fine is active", () => {
    const { group } = createHarness();
    expect(failure(() => group.payFine("bob", { asset: "native", amount: 100 })).code).toBe("NO_ACTIVE_FINE");
    group.punishMember("alice", "bob", "Warning", "Heads up");
    expect(failure(() => group.payFine("bob", { asset: "native", amount: 100 })).code).toBe("NO_ACTIVE_FINE");
  });

  it("escalates the third consecutive fine to a ban under Fine mode", () => {
    const { group } = createHarness({ group: { punishmentMode: "Fine" } });
    expect(group.punishMember("alice", "bob", "Fine", "Late")).toBe("Fine");
    expect(group.punishMember("alice", "bob", "Fine", "Late")).toBe("Fine");
    expect(group.punishMember("alice", "bob", "Fine", "Late")).toBe("Ban");

    expect(group.getPunishmentDetails("bob")).toMatchObject({
      action: "Ban",
      reason: "Late (escalated after 3 consecutive fines)",
      isActive: true,
      fineAmount: 0,
    });
    expect(group.getMemberDetails("bob").isActive).toBe(false);
    expect(group.getActiveMemberCount()).toBe(4);
    expect(failure(() => group.punishMember("alice", "bob", "Warning", "Again")).code).toBe("ALREADY_BANNED");
  });

  it("restarts the fine streak after a fine is paid", () => {
    const { group } = createHarness({ group: { punishmentMode: "Fine" } });
    group.punishMember("alice", "bob", "Fine", "Late");
    group.payFine("bob", { asset: "native", amount: 100 });
    group.punishMember("alice", "bob", "Fine", "Late");
    expect(group.punishMember("alice", "bob", "Fine", "Late")).toBe("Fine");
    expect(group.getMemberDetails("bob").consecutiveFines).toBe(2);
  });

  it("does not escalate fines outside Fine mode", () => {
    const { group } = createHarness({ group: { punishmentMode: "Warning" } });
    ["first", "second", "third"].forEach((reason) => {
      expect(group.punishMember("alice", "bob", "Fine", reason)).toBe("Fine");
    });
    expect(group.getMemberDetails("bob")).toMatchObject({ isActive: true, consecutiveFines: 0 });
  });

  it("validates the caller, the target and the action", () => {
    const { group } = createHarness();
    expect(failure(() => group.punishMember("bob", "carol", "Warning", "x")).code).toBe("NOT_ADMIN");
    const missing = failure(() => group.punishMember("alice", "mallory", "Warning", "x"));
    expect(missing.code).toBe("NOT_MEMBER");
    expect(missing.status).toBe(404);
    const none = failure(() => group.punishMember("alice", "bob", "None", "x"));
    expect(none.code).toBe("INVALID_ACTION");
    expect(none.status).toBe(400);
  });

  it("reactivates a banned member when the ban is cancelled", () => {
    const { group } = createHarness();
    group.punishMember("alice", "bob", "Ban", "Fraud");
    expect(group.getActiveMemberCount()).toBe(4);

    group.cancelPunishment("alice", "bob");
    expect(group.getPunishmentDetails("bob").isActive).toBe(false);
    expect(group.getMemberDetails("bob")).toMatchObject({
      isActive: true,
      missedContributions: 0,
      consecutiveFines: 0,
    });
    expect(group.getActiveMemberCount()).toBe(5);

    const nothing = failure(() => group.cancelPunishment("alice", "bob"));
    expect(nothing.code).toBe("NO_ACTIVE_PUNISHMENT");
    expect(nothing.status).toBe(409);
  });
});
