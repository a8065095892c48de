/**
 * WithdrawalAuthorizer — operator-submitted, owner-signed redemptions.
 *
 * A share owner signs a WithdrawalRequest off-line. A withdrawal operator
 * submits it; the authorizer checks expiry, nonce and signature, marks the
 * nonce used and runs the managed redeem (withdraw hooks included) on the
 * owner's behalf. Owners approve the authorizer for their shares once.
 *
 * Signatures are recovered before any state is read. The checks and the
 * redeem then run synchronously in one atomic scope, so nothing can
 * interleave between checking a nonce and spending it.
 */

import { recoverTypedDataAddress } from "viem";
import type { TypedDataDomain } from "viem";
import type { Address, AuthorizationOracle, Hex } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { Checkpointable, Environment } from "@shareport/runtime";
import { toAddress, toNonZeroAddress } from "@shareport/runtime";
import type {
  ManagedRedeemer,
  SignedWithdrawal,
  WithdrawalAuthorizerConfig,
  WithdrawalRequest,
} from "./types.js";
import {
  hashWithdrawalRequest,
  withdrawalDomain,
  withdrawalTypedData,
} from "./withdrawal-typed-data.js";
import { WithdrawalError } from "./errors.js";

type UsedNonces = ReadonlyMap<Address, ReadonlySet<bigint>>;

interface RecoveredWithdrawal {
  readonly request: WithdrawalRequest;
  /** null when the signature could not be parsed at all */
  readonly signer: Address | null;
}

export class WithdrawalAuthorizer implements Checkpointable<UsedNonces> {
  readonly address: Address;
  readonly domain: TypedDataDomain;

  private readonly env: Environment;
  private readonly vault: ManagedRedeemer;
  private readonly authorization: AuthorizationOracle;
  private readonly streamId: string;
  private _usedNonces = new Map<Address, Set<bigint>>();

  constructor(env: Environment, config: WithdrawalAuthorizerConfig) {
    this.env = env;
    this.address = toNonZeroAddress(config.address, "authorizer address");
    this.vault = config.vault;
    this.authorization = config.authorization;
    this.domain = withdrawalDomain(config.domainName, config.domainVersion, env.chainId, this.address);
    this.streamId = `withdrawals:${this.address}`;
    env.register(this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @returns assets released to `request.to`
   */
  async withdrawWithSignature(
    caller: Address,
    request: WithdrawalRequest,
    signature: Hex,
  ): Promise<bigint> {
    const [assets] = await this.batchWithdrawWithSignatures(caller, [{ request, signature }]);
    return assets ?? 0n;
  }

  /**
   * Execute several signed requests as one operation. Any invalid entry
   * aborts them all.
   * @returns assets released per entry, in input order
   */
  async batchWithdrawWithSignatures(
    caller: Address,
    entries: readonly SignedWithdrawal[],
  ): Promise<bigint[]> {
    this.requireOperator(caller);
    if (entries.length === 0) {
      throw new WithdrawalError("EMPTY_BATCH", "Batch needs at least one signed withdrawal");
    }

    const recovered = await Promise.all(entries.map((entry) => this.recover(entry)));

    // Grants may have changed while signatures were recovered.
    this.requireOperator(caller);
    return this.env.atomic(() => recovered.map((entry) => this.execute(caller, entry)));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isNonceUsed(owner: string, nonce: bigint): boolean {
    return this._usedNonces.get(toAddress(owner, "owner"))?.has(nonce) ?? false;
  }

  hashWithdrawalRequest(request: WithdrawalRequest): Hex {
    return hashWithdrawalRequest(this.domain, request);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpointable
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): UsedNonces {
    return new Map([...this._usedNonces].map(([owner, nonces]) => [owner, new Set(nonces)]));
  }

  restore(state: UsedNonces): void {
    this._usedNonces = new Map([...state].map(([owner, nonces]) => [owner, new Set(nonces)]));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private async recover(entry: SignedWithdrawal): Promise<RecoveredWithdrawal> {
    try {
      const signer = await recoverTypedDataAddress({
        ...withdrawalTypedData(this.domain, entry.request),
        signature: entry.signature,
      });
      return { request: entry.request, signer };
    } catch (error) {
      if (error instanceof Error) {
        return { request: entry.request, signer: null };
      }
      throw error;
    }
  }

  private execute(caller: Address, { request, signer }: RecoveredWithdrawal): bigint {
    const owner = toNonZeroAddress(request.owner, "owner");

    if (request.expirationTime < this.env.timestamp) {
      throw new WithdrawalError(
        "WITHDRAWAL_REQUEST_EXPIRED",
        `Withdrawal request ${request.nonce} of ${owner} expired at ${request.expirationTime}`,
      );
    }
    if (this.isNonceUsed(owner, request.nonce)) {
      throw new WithdrawalError("WITHDRAW_NONCE_REUSE", `Nonce ${request.nonce} of ${owner} is already used`);
    }
    if (signer === null || toAddress(signer, "signer") !== owner) {
      throw new WithdrawalError(
        "WITHDRAW_INVALID_SIGNATURE",
        `Withdrawal request ${request.nonce} is not signed by ${owner}`,
      );
    }

    const nonces = this._usedNonces.get(owner) ?? new Set<bigint>();
    nonces.add(request.nonce);
    this._usedNonces.set(owner, nonces);

    this.env.emit(this.streamId, SHAREPORT_EVENTS.NONCE_USED, "withdrawals", caller, {
      owner,
      nonce: request.nonce.toString(),
      to: request.to,
      shares: request.shares.toString(),
    });

    return this.vault.redeem(this.address, request.shares, request.to, owner, request.minAssets);
  }

  private requireOperator(caller: Address): void {
    if (!this.authorization.isAuthorized(caller, "withdrawal-operator")) {
      throw new WithdrawalError("UNAUTHORIZED", `${caller} lacks the withdrawal-operator role`);
    }
  }
}
