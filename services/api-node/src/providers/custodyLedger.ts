import { NATIVE_ASSET } from "@chamapool/shared";
import { HttpError } from "../utils/errors.js";
import { uid } from "../utils/crypto.js";

export interface TransferInput {
  asset: string;
  from: string;
  to: string;
  amount: number;
  memo: string;
}

export interface TransferReceipt {
  reference: string;
  asset: string;
  from: string;
  to: string;
  amount: number;
  memo: string;
}

/**
 * Moves value between accounts. Implementations either apply the whole
 * transfer or throw; there is no partial outcome.
 */
export interface ValueTransfer {
  transfer(input: TransferInput): TransferReceipt;
}

export interface CustodyLedgerOptions {
  /** Credited the first time an external account is seen. */
  openingBalance?: number;
}

export class CustodyLedger implements ValueTransfer {
  private balances = new Map<string, number>();
  private seen = new Set<string>();
  private custodyAccounts = new Set<string>();
  private receipts: TransferReceipt[] = [];
  private readonly openingBalance: number;

  constructor(options: CustodyLedgerOptions = {}) {
    this.openingBalance = options.openingBalance ?? 0;
  }

  /** Custody accounts never receive an opening balance. */
  registerCustodyAccount(account: string): void {
    this.custodyAccounts.add(account);
    this.seen.add(account);
  }

  fund(account: string, amount: number, asset: string = NATIVE_ASSET): void {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new HttpError(400, "INVALID_AMOUNT", "Funding amount must be a positive integer.");
    }
    this.touch(account);
    this.credit(account, asset, amount);
  }

  balanceOf(account: string, asset: string = NATIVE_ASSET): number {
    this.touch(account);
    return this.balances.get(key(account, asset)) ?? 0;
  }

  history(account?: string): TransferReceipt[] {
    if (!account) {
      return [...this.receipts];
    }
    return this.receipts.filter((entry) => entry.from === account || entry.to === account);
  }

  transfer(input: TransferInput): TransferReceipt {
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      throw new HttpError(400, "INVALID_AMOUNT", "Transfer amount must be a positive integer.");
    }
    this.touch(input.from);
    this.touch(input.to);
    const available = this.balances.get(key(input.from, input.asset)) ?? 0;
    if (available < input.amount) {
      throw new HttpError(422, "INSUFFICIENT_FUNDS", "Insufficient balance for transfer.", {
        account: input.from,
        asset: input.asset,
        available,
        required: input.amount,
      });
    }
    this.balances.set(key(input.from, input.asset), available - input.amount);
    this.credit(input.to, input.asset, input.amount);

    const receipt: TransferReceipt = { reference: uid("xfer"), ...input };
    this.receipts.push(receipt);
    return receipt;
  }

  private touch(account: string): void {
    if (this.seen.has(account)) {
      return;
    }
    this.seen.add(account);
    if (this.openingBalance > 0 && !this.custodyAccounts.has(account)) {
      this.credit(account, NATIVE_ASSET, this.openingBalance);
    }
  }

  private credit(account: string, asset: string, amount: number): void {
    const current = this.balances.get(key(account, asset)) ?? 0;
    this.balances.set(key(account, asset), current + amount);
  }
}

function key(account: string, asset: string): string {
  return `${account}::${asset}`;
}
