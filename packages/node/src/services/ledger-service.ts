/**
 * LedgerService — Composition root for the vault ledger.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One VaultLedger pays out through one PayoutBook,
 * and every committed change is appended to the event store as an
 * audit trail.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { DomainEvent, Identity, VaultId } from "@coffer/types";
import {
  PayoutBook,
  VaultLedger,
  VaultLedgerError,
  formatAmount,
  parseAmount,
} from "@coffer/ledger";
import type { VaultLedgerSnapshot, VaultNotification } from "@coffer/ledger";
import {
  InMemoryEventStore,
  VAULT_EVENTS,
  vaultStreamId,
} from "@coffer/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  VaultCreatedPayload,
  VaultDepositedPayload,
  VaultWithdrawnPayload,
} from "@coffer/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly logger: Logger;
  /** Identities whose payouts are refused by the payout book. */
  readonly refusingRecipients?: Iterable<Identity> | undefined;
  /** Restore vaults from a snapshot instead of starting empty. */
  readonly snapshot?: VaultLedgerSnapshot | undefined;
  /** ISO timestamp source for events and snapshots. Default: wall clock. */
  readonly clock?: (() => string) | undefined;
  /** Event id source. Default: randomUUID. */
  readonly idGenerator?: (() => string) | undefined;
}

/**
 * Wire representation of a vault. Balances are decimal strings.
 */
export interface VaultResource {
  readonly vaultId: VaultId;
  readonly owner: Identity;
  readonly balance: string;
}

type Operation = "createVault" | "deposit" | "withdraw";

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledger: VaultLedger;
  readonly payouts: PayoutBook;
  readonly eventStore: InMemoryEventStore;

  private readonly _logger: Logger;
  private readonly _clock: () => string;
  private readonly _idGenerator: () => string;

  /** Correlation id of the request currently driving the ledger. */
  private _correlationId: string | undefined;
  private _ready = false;

  constructor(config: LedgerServiceConfig) {
    this._logger = config.logger;
    this._clock = config.clock ?? (() => new Date().toISOString());
    this._idGenerator = config.idGenerator ?? randomUUID;

    this.payouts = new PayoutBook(config.refusingRecipients);
    this.eventStore = new InMemoryEventStore({ clock: this._clock });

    const ledgerOptions = { transfer: this.payouts, clock: this._clock };
    this.ledger =
      config.snapshot !== undefined
        ? VaultLedger.fromSnapshot(config.snapshot, ledgerOptions)
        : new VaultLedger(ledgerOptions);

    this.ledger.subscribe((notification) => {
      this._record(notification);
    });

    this._ready = true;
  }

  // ─── Vault Operations ──────────────────────────────────────────────

  createVault(caller: Identity, correlationId?: string): VaultResource {
    return this._run("createVault", caller, correlationId, () => {
      const vaultId = this.ledger.createVault(caller);
      return this.getVault(vaultId);
    });
  }

  deposit(
    caller: Identity,
    vaultId: VaultId,
    amount: string,
    correlationId?: string,
  ): VaultResource {
    return this._run("deposit", caller, correlationId, () => {
      this.ledger.depositInto(caller, vaultId, parseAmount(amount));
      return this.getVault(vaultId);
    });
  }

  withdraw(
    caller: Identity,
    vaultId: VaultId,
    amount: string,
    correlationId?: string,
  ): VaultResource {
    return this._run("withdraw", caller, correlationId, () => {
      this.ledger.withdrawFrom(caller, vaultId, parseAmount(amount));
      return this.getVault(vaultId);
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getVault(vaultId: VaultId): VaultResource {
    const view = this.ledger.getVault(vaultId);
    return {
      vaultId,
      owner: view.owner,
      balance: formatAmount(view.balance),
    };
  }

  countVaults(): number {
    return this.ledger.getVaultCount();
  }

  vaultsOwnedBy(caller: Identity): readonly VaultId[] {
    return this.ledger.getVaultsOwnedBy(caller);
  }

  snapshot(): VaultLedgerSnapshot {
    return this.ledger.snapshot();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  /**
   * Events of one vault. Throws NOT_FOUND for an unknown vault.
   */
  readVaultEvents(
    vaultId: VaultId,
    options?: ReadOptions,
  ): readonly HashedStoredEvent[] {
    this.ledger.getVault(vaultId);
    return this.eventStore.read(vaultStreamId(vaultId), options);
  }

  eventCount(): number {
    return this.eventStore.globalPosition();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Ready while the service is running and the audit chain verifies.
   */
  isReady(): boolean {
    return this._ready && this.verifyIntegrity().valid;
  }

  stop(): void {
    this._ready = false;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  /**
   * Run a ledger operation under a correlation id and log rejections.
   * Nested operations triggered from inside a payout keep the outer id.
   */
  private _run<T>(
    operation: Operation,
    caller: Identity,
    correlationId: string | undefined,
    fn: () => T,
  ): T {
    const previous = this._correlationId;
    this._correlationId = previous ?? correlationId ?? this._idGenerator();
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof VaultLedgerError) {
        this._logger.warn(
          { operation, caller, vaultId: err.vaultId, code: err.code },
          err.message,
        );
      }
      throw err;
    } finally {
      this._correlationId = previous;
    }
  }

  private _record(notification: VaultNotification): void {
    const event = this._toDomainEvent(notification);
    const stored = this.eventStore.append(vaultStreamId(notification.vaultId), event);

    this._logger.info(
      {
        event: event.type,
        vaultId: notification.vaultId,
        owner: notification.owner,
        version: stored.version,
      },
      "Vault event recorded",
    );
  }

  private _toDomainEvent(notification: VaultNotification): DomainEvent {
    const eventId = this._idGenerator();
    const metadata = {
      eventId,
      timestamp: this._clock(),
      actor: notification.owner,
      correlationId: this._correlationId ?? eventId,
      source: "ledger" as const,
    };

    switch (notification.type) {
      case "VaultCreated": {
        const payload = {
          vaultId: notification.vaultId,
          owner: notification.owner,
        } satisfies VaultCreatedPayload;
        return { type: VAULT_EVENTS.created, metadata, payload };
      }
      case "VaultDeposited": {
        const payload = {
          vaultId: notification.vaultId,
          owner: notification.owner,
          amount: formatAmount(notification.amount),
        } satisfies VaultDepositedPayload;
        return { type: VAULT_EVENTS.deposited, metadata, payload };
      }
      case "VaultWithdrawn": {
        const payload = {
          vaultId: notification.vaultId,
          owner: notification.owner,
          amount: formatAmount(notification.amount),
        } satisfies VaultWithdrawnPayload;
        return { type: VAULT_EVENTS.withdrawn, metadata, payload };
      }
    }
  }
}
