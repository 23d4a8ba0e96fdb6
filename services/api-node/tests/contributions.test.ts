import { describe, expect, it } from "vitest";
import { ONE_DAY, ONE_WEEK } from "../src/utils/time.js";
import { CONTRIBUTION, FUNDING, START, createHarness, contributeAll, failure } from "./helpers/fixtures.js";

const payment = { asset: "native", amount: CONTRIBUTION };

describe("contributions", () => {
  it("records the contribution and moves funds into custody", () => {
    const { group, ledger } = createHarness();
    expect(group.contribute("bob", payment)).toEqual({ period: 0, timestamp: START, missedDetected: 0 });

    expect(group.getContributionTimestamp("bob", 0)).toBe(START);
    expect(group.getContributionStatus("bob", 0)).toBe(true);
    expect(group.getContributionStatus("carol", 0)).toBe(false);
    expect(group.getMemberDetails("bob").totalContributed).toBe(CONTRIBUTION);
    expect(group.getBalance()).toBe(CONTRIBUTION);
    expect(ledger.balanceOf(group.id)).toBe(CONTRIBUTION);
    expect(ledger.balanceOf("bob")).toBe(FUNDING - CONTRIBUTION);
    expect(ledger.history(group.id).map((entry) => entry.memo)).toEqual([`${group.id}:contribution:0`]);
  });

  it("rejects a second contribution in the same period", () => {
    const { group } = createHarness();
    group.contribute("bob", payment);
    const again = failure(() => group.contribute("bob", payment));
    expect(again.code).toBe("ALREADY_CONTRIBUTED");
    expect(again.message).toBe("Already contributed this period");
  });

  it("requires the exact amount and asset", () => {
    const { group } = createHarness();
    const wrongAmount = failure(() => group.contribute("bob", { asset: "native", amount: CONTRIBUTION - 1 }));
    expect(wrongAmount.code).toBe("INCORRECT_AMOUNT");
    expect(wrongAmount.status).toBe(422);
    expect(wrongAmount.details).toEqual({ category: "value_mismatch" });

    const wrongAsset = failure(() => group.contribute("bob", { asset: "usdc", amount: CONTRIBUTION }));
    expect(wrongAsset.code).toBe("INCORRECT_ASSET");
    expect(group.getBalance()).toBe(0);
  });

  it("rejects non-members", () => {
    const { group } = createHarness();
    const outsider = failure(() => group.contribute("mallory", payment));
    expect(outsider.code).toBe("NOT_ACTIVE_MEMBER");
    expect(outsider.status).toBe(403);
  });

  it("closes the window after the contribution window and grace period", () => {
    const { group, clock } = createHarness();
    clock.set(START + 3 * ONE_DAY);
    expect(group.isContributionWindowOpen()).toBe(true);
    clock.set(START + 3 * ONE_DAY + 1);
    expect(group.isContributionWindowOpen()).toBe(false);
    expect(failure(() => group.contribute("bob", payment)).message).toBe("Contribution window closed");

    clock.set(START + ONE_WEEK);
    expect(group.getCurrentPeriod()).toBe(1);
    expect(group.isContributionWindowOpen()).toBe(true);
  });

  it("only accepts contributions between the start and end dates", () => {
    const { group, clock } = createHarness();
    clock.set(START - 1);
    expect(group.getCurrentPeriod()).toBe(0);
    expect(group.isContributionWindowOpen()).toBe(false);
    expect(failure(() => group.contribute("bob", payment)).code).toBe("GROUP_NOT_STARTED");

    clock.set(group.rules.endDate + 1);
    expect(failure(() => group.contribute("bob", payment)).code).toBe("GROUP_ENDED");
  });
});

describe("missed contribution detection", () => {
  it("counts every skipped period when the member next contributes", () => {
    const { group, clock } = createHarness({ group: { punishmentMode: "Fine" } });
    group.contribute("bob", payment);

    clock.set(START + 3 * ONE_WEEK + 60);
    expect(group.contribute("bob", payment).missedDetected).toBe(2);
    expect(group.getMemberDetails("bob").missedContributions).toBe(2);
    expect(group.getPunishmentDetails("bob").isActive).toBe(false);

    clock.set(START + 5 * ONE_WEEK + 60);
    const receipt = group.contribute("bob", payment);
    expect(receipt).toEqual({ period: 5, timestamp: START + 5 * ONE_WEEK + 60, missedDetected: 1 });
    expect(group.getPunishmentDetails("bob")).toEqual({
      action: "Fine",
      reason: "Missed contribution for period 4",
      isActive: true,
      issuedAt: START + 5 * ONE_WEEK + 60,
      fineAmount: 100,
    });
    expect(group.getMemberDetails("bob")).toMatchObject({
      totalContributed: 3 * CONTRIBUTION,
      missedContributions: 3,
      consecutiveFines: 1,
    });
    expect(
      group.getEvents("MissedContributionDetected").map((event) => event.type === "MissedContributionDetected" && event.period)
    ).toEqual([1, 2, 4]);
  });

  it("escalates automatic fines to a ban under Fine mode", () => {
    const { group, clock } = createHarness({ group: { punishmentMode: "Fine" } });
    clock.set(START + 5 * ONE_WEEK + 60);

    expect(group.contribute("bob", payment).missedDetected).toBe(5);
    expect(group.getPunishmentDetails("bob")).toMatchObject({
      action: "Ban",
      reason: "Missed contribution for period 4 (escalated after 3 consecutive fines)",
      isActive: true,
    });
    expect(group.getMemberDetails("bob")).toMatchObject({
      isActive: false,
      missedContributions: 5,
      consecutiveFines: 3,
    });
    expect(
      group.getEvents("MemberPunished").map((event) => event.type === "MemberPunished" && event.action)
    ).toEqual(["Fine", "Fine", "Ban"]);
  });

  it("does not count the period a member was reinstated in after its deadline", () => {
    const { group, clock } = createHarness();
    group.punishMember("alice", "bob", "Ban", "Review");
    clock.set(START + ONE_WEEK + 4 * ONE_DAY);
    group.cancelPunishment("alice", "bob");

    clock.set(START + 2 * ONE_WEEK);
    expect(group.checkMissedContributions("alice", "bob")).toBe(0);
    clock.set(START + 3 * ONE_WEEK);
    expect(group.checkMissedContributions("alice", "bob")).toBe(1);
  });

  it("bans automatically once the missed limit is exceeded under Ban mode", () => {
    const { group, clock } = createHarness({ group: { punishmentMode: "Ban" } });
    clock.set(START + 3 * ONE_WEEK);

    expect(group.checkMissedContributions("alice", "bob")).toBe(3);
    expect(group.getPunishmentDetails("bob")).toMatchObject({ action: "Ban", isActive: true });
    expect(group.getMemberDetails("bob").isActive).toBe(false);
    expect(group.getActiveMemberCount()).toBe(4);
    expect(failure(() => group.contribute("bob", payment)).code).toBe("NOT_ACTIVE_MEMBER");
  });

  it("only counts misses when punishment mode is None", () => {
    const { group, clock } = createHarness();
    clock.set(START + 4 * ONE_WEEK);
    expect(group.checkMissedContributions("alice", "bob")).toBe(4);
    expect(group.getPunishmentDetails("bob").isActive).toBe(false);
    expect(group.getMemberDetails("bob").isActive).toBe(true);
  });

  it("checks every active member and never counts a period twice", () => {
    const { group, clock } = createHarness();
    contributeAll(group, ["alice", "bob"]);
    clock.set(START + ONE_WEEK);

    expect(group.checkMissedContributions("alice")).toBe(3);
    expect(group.checkMissedContributions("alice")).toBe(0);
    expect(group.getMemberDetails("alice").missedContributions).toBe(0);
    expect(group.getMemberDetails("carol").missedContributions).toBe(1);
  });

  it("skips the joining period when its deadline has already passed", () => {
    const { group, clock } = createHarness({ members: ["alice"] });
    clock.set(START + 4 * ONE_DAY);
    group.join("bob");

    clock.set(START + ONE_WEEK + 4 * ONE_DAY);
    expect(group.checkMissedContributions("alice", "bob")).toBe(1);
    expect(group.getEvents("MissedContributionDetected").at(-1)).toMatchObject({ member: "bob", period: 1 });
  });

  it("stops at the last period before the end date", () => {
    const { group, clock } = createHarness({ members: ["alice", "bob"] });
    clock.set(START + 12 * ONE_WEEK);
    expect(group.checkMissedContributions("alice", "bob")).toBe(10);
  });

  it("is restricted to admins", () => {
    const { group } = createHarness();
    expect(failure(() => group.checkMissedContributions("bob")).code).toBe("NOT_ADMIN");
    expect(failure(() => group.checkMissedContributions("alice", "mallory")).status).toBe(404);
  });
});
