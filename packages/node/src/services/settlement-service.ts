/**
 * SettlementService — Composition root for the settlement packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance serves the whole process so that the
 * per-cycle lock and the closure tracker are shared by every request.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  AuthoritativeSettlementSource,
  ConfirmationClaim,
  ParticipantDirectory,
} from "@closeout/types";
import {
  InMemoryNotificationStore,
  JsonlNotificationStore,
  NotificationLedger,
} from "@closeout/ledger";
import type { NotificationStore } from "@closeout/ledger";
import { IdentityResolver, ReconciliationValidator } from "@closeout/reconciler";
import { SettlementLifecycle } from "@closeout/settlement";
import type {
  ClosureRetryResult,
  CycleStatus,
  SubmissionResult,
} from "@closeout/settlement";
import { HubParticipantDirectory, HubSettlementSource } from "@closeout/hub-client";
import {
  AlertDispatcher,
  LogAlertChannel,
  WebhookAlertChannel,
} from "@closeout/alerts";
import type { AlertChannel } from "@closeout/alerts";
import type { AppConfig } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface SettlementServiceDeps {
  readonly source: AuthoritativeSettlementSource;
  readonly directory: ParticipantDirectory;
  readonly channel: AlertChannel;
  /** Default: in-memory */
  readonly store?: NotificationStore | undefined;
  /** Default: "0.01" */
  readonly amountTolerance?: string | undefined;
  /** Default: 5000 */
  readonly remoteTimeoutMs?: number | undefined;
  /** Default: true */
  readonly notifyPartialProgress?: boolean | undefined;
  /** Hub operator addresses for CYCLE_CLOSED alerts. Default: none */
  readonly operatorAddresses?: readonly string[] | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class SettlementService {
  readonly ledger: NotificationLedger;
  readonly lifecycle: SettlementLifecycle;
  readonly dispatcher: AlertDispatcher;

  private _ready = true;

  constructor(deps: SettlementServiceDeps) {
    const logger = deps.logger ?? pino({ level: "silent" });
    const timeoutMs = deps.remoteTimeoutMs ?? 5000;

    this.ledger = new NotificationLedger({
      store: deps.store ?? new InMemoryNotificationStore(),
      now: deps.now,
    });
    this.dispatcher = new AlertDispatcher({
      channel: deps.channel,
      logger: logger.child({ component: "alerts" }),
    });
    this.lifecycle = new SettlementLifecycle({
      validator: new ReconciliationValidator({
        source: deps.source,
        amountTolerance: deps.amountTolerance,
        timeoutMs,
      }),
      ledger: this.ledger,
      source: deps.source,
      identities: new IdentityResolver({ directory: deps.directory, timeoutMs }),
      alerts: this.dispatcher,
      remoteTimeoutMs: timeoutMs,
      notifyPartialProgress: deps.notifyPartialProgress,
      operatorAddresses: deps.operatorAddresses,
      logger: logger.child({ component: "lifecycle" }),
      now: deps.now,
    });
  }

  /**
   * Wire the HTTP adapters, the notification store and the alert
   * channel named by the configuration.
   */
  static fromAppConfig(config: AppConfig, logger: Logger): SettlementService {
    const http = {
      timeout: config.REMOTE_TIMEOUT_MS,
      retries: config.REMOTE_RETRIES,
    };

    const channel: AlertChannel =
      config.ALERT_WEBHOOK_URL !== undefined
        ? new WebhookAlertChannel({ url: config.ALERT_WEBHOOK_URL, timeout: config.REMOTE_TIMEOUT_MS })
        : new LogAlertChannel(logger.child({ component: "alert-log" }));

    const store: NotificationStore =
      config.LEDGER_FILE !== undefined
        ? new JsonlNotificationStore({ filePath: config.LEDGER_FILE })
        : new InMemoryNotificationStore();

    if (config.LEDGER_FILE === undefined) {
      logger.warn("LEDGER_FILE not set; confirmations are kept in memory only");
    }

    return new SettlementService({
      source: new HubSettlementSource({ baseUrl: config.HUB_BASE_URL, ...http }),
      directory: new HubParticipantDirectory({ baseUrl: config.LEDGER_URL, ...http }),
      channel,
      store,
      amountTolerance: config.AMOUNT_TOLERANCE,
      remoteTimeoutMs: config.REMOTE_TIMEOUT_MS,
      notifyPartialProgress: config.NOTIFY_PARTIAL_PROGRESS,
      operatorAddresses: config.OPERATOR_ALERT_ADDRESSES,
      logger,
    });
  }

  // ─── Operations ──────────────────────────────────────────────────

  submitConfirmation(cycleId: string, claim: ConfirmationClaim): Promise<SubmissionResult> {
    return this.lifecycle.submitConfirmation(cycleId, claim);
  }

  getStatus(cycleId: string): Promise<CycleStatus> {
    return this.lifecycle.getStatus(cycleId);
  }

  retryClosure(cycleId: string): Promise<ClosureRetryResult> {
    return this.lifecycle.retryClosure(cycleId);
  }

  // ─── Health ──────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready && this.ledger.isWritable();
  }

  /** Stop reporting ready and wait for pending alert deliveries. */
  async shutdown(): Promise<void> {
    this._ready = false;
    await this.lifecycle.drainAlerts();
  }
}
