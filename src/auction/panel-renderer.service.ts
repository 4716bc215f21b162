import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  TransportPermissionError,
  errorMessage,
} from '../common/errors';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import {
  MESSAGING_TRANSPORT,
  type MessageRef,
  type MessagingTransport,
  type PanelPayload,
  type SummaryPayload,
} from '../messaging/messaging.types';

export type ReferenceListener = (ref: MessageRef) => void;

interface PanelState {
  channelId: string;
  ref: MessageRef | null;
  onReference: ReferenceListener | null;
  window: ReturnType<typeof setTimeout> | null;
  pending: PanelPayload | null;
  chain: Promise<void>;
  degraded: boolean;
  archived: boolean;
  renders: number;
  lastError: string | null;
}

export interface PanelStatus {
  tracked: boolean;
  degraded: boolean;
  renders: number;
  messageRef: MessageRef | null;
  lastError: string | null;
}

/**
 * Renders auction panels through the messaging transport.
 *
 * A request outside a window renders at once and opens a window of
 * `panelUpdateDelayMs`; requests inside it coalesce and the last one renders
 * when the window closes. Renders for one panel never overlap. A permission
 * failure marks the panel degraded and stops further renders for it.
 */
@Injectable()
export class PanelRenderer implements OnModuleDestroy {
  private readonly logger = new Logger(PanelRenderer.name);
  private readonly panels = new Map<string, PanelState>();

  constructor(
    @Inject(MESSAGING_TRANSPORT) private readonly transport: MessagingTransport,
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  /** Start tracking a panel. `ref` is set when recovering an already posted one. */
  track(
    auctionId: string,
    channelId: string,
    ref: MessageRef | null,
    onReference: ReferenceListener | null = null,
  ): void {
    this.release(auctionId);
    this.panels.set(auctionId, {
      channelId,
      ref,
      onReference,
      window: null,
      pending: null,
      chain: Promise.resolve(),
      degraded: false,
      archived: false,
      renders: 0,
      lastError: null,
    });
  }

  request(auctionId: string, payload: PanelPayload): void {
    const panel = this.panels.get(auctionId);
    if (!panel || panel.archived || panel.degraded) return;
    if (panel.window) {
      panel.pending = payload;
      return;
    }
    this.dispatch(panel, payload);
  }

  /** Resolves once every render queued so far has settled. */
  whenIdle(auctionId: string): Promise<void> {
    return this.panels.get(auctionId)?.chain ?? Promise.resolve();
  }

  async whenAllIdle(): Promise<void> {
    await Promise.all([...this.panels.values()].map((panel) => panel.chain));
  }

  /**
   * Drop pending renders and replace the panel with the summary. When the
   * panel cannot be edited the summary is posted as a new message and the
   * old panel removed. The panel is no longer tracked afterwards.
   */
  async finalize(auctionId: string, summary: SummaryPayload): Promise<void> {
    const panel = this.panels.get(auctionId);
    if (!panel) return;
    panel.archived = true;
    this.closeWindow(panel);
    await panel.chain;
    this.panels.delete(auctionId);

    if (panel.degraded) {
      this.logger.warn(
        `Panel for auction ${auctionId} is degraded; summary not posted to ${panel.channelId}`,
      );
      return;
    }
    if (panel.ref) {
      try {
        await this.transport.edit(panel.ref, summary);
        return;
      } catch (err) {
        this.logger.warn(
          `Could not replace panel for auction ${auctionId} with summary: ${errorMessage(err)}`,
        );
        if (err instanceof TransportPermissionError) return;
      }
    }
    try {
      await this.transport.send(panel.channelId, summary);
    } catch (err) {
      this.logger.error(
        `Could not post summary for auction ${auctionId}: ${errorMessage(err)}`,
      );
      return;
    }
    if (panel.ref) {
      await this.transport
        .delete(panel.ref)
        .catch((err) =>
          this.logger.warn(
            `Could not remove old panel for auction ${auctionId}: ${errorMessage(err)}`,
          ),
        );
    }
  }

  status(auctionId: string): PanelStatus {
    const panel = this.panels.get(auctionId);
    return {
      tracked: panel !== undefined,
      degraded: panel?.degraded ?? false,
      renders: panel?.renders ?? 0,
      messageRef: panel?.ref ?? null,
      lastError: panel?.lastError ?? null,
    };
  }

  /** Stop tracking without touching the posted message. */
  release(auctionId: string): void {
    const panel = this.panels.get(auctionId);
    if (!panel) return;
    panel.archived = true;
    this.closeWindow(panel);
    this.panels.delete(auctionId);
  }

  onModuleDestroy(): void {
    for (const auctionId of [...this.panels.keys()]) {
      this.release(auctionId);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private dispatch(panel: PanelState, payload: PanelPayload): void {
    panel.window = setTimeout(() => {
      panel.window = null;
      const next = panel.pending;
      panel.pending = null;
      if (next && !panel.archived && !panel.degraded) this.dispatch(panel, next);
    }, this.settings.panelUpdateDelayMs);
    panel.chain = panel.chain.then(() => this.render(panel, payload));
  }

  private closeWindow(panel: PanelState): void {
    if (panel.window) clearTimeout(panel.window);
    panel.window = null;
    panel.pending = null;
  }

  private async render(panel: PanelState, payload: PanelPayload): Promise<void> {
    if (panel.archived || panel.degraded) return;
    try {
      if (panel.ref) {
        await this.transport.edit(panel.ref, payload);
      } else {
        const ref = await this.transport.send(panel.channelId, payload);
        panel.ref = ref;
        panel.onReference?.(ref);
      }
      panel.renders += 1;
    } catch (err) {
      panel.lastError = errorMessage(err);
      if (err instanceof TransportPermissionError) {
        panel.degraded = true;
        this.closeWindow(panel);
        this.logger.error(
          `Panel for auction ${payload.auctionId} degraded: ${panel.lastError}`,
        );
        return;
      }
      this.logger.warn(
        `Panel render for auction ${payload.auctionId} failed: ${panel.lastError}`,
      );
    }
  }
}
