import { Inject, Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Socket } from 'socket.io';
import {
  TransportError,
  TransportPermissionError,
  errorMessage,
} from '../common/errors';
import type { BridgeSettings } from '../config/configuration';
import type {
  DisplayPayload,
  MessageRef,
  MessagingTransport,
} from './messaging.types';

export const BRIDGE_SETTINGS = Symbol('BRIDGE_SETTINGS');

type BridgeAck =
  | { ok: true; messageId?: string }
  | { ok: false; error: string; message?: string };

function parseAck(raw: unknown): BridgeAck | null {
  if (typeof raw !== 'object' || raw === null || !('ok' in raw)) return null;
  if (raw.ok === true) {
    const messageId =
      'messageId' in raw && typeof raw.messageId === 'string'
        ? raw.messageId
        : undefined;
    return { ok: true, messageId };
  }
  if (raw.ok === false) {
    const error = 'error' in raw && typeof raw.error === 'string' ? raw.error : 'unknown';
    const message =
      'message' in raw && typeof raw.message === 'string' ? raw.message : undefined;
    return { ok: false, error, message };
  }
  return null;
}

function parseChannelIds(body: unknown): string[] | null {
  if (typeof body !== 'object' || body === null || !('channelIds' in body)) {
    return null;
  }
  const { channelIds } = body;
  if (!Array.isArray(channelIds)) return null;
  const ids = channelIds.filter(
    (id): id is string => typeof id === 'string' && id.trim() !== '',
  );
  return ids.length > 0 ? ids : null;
}

/**
 * MessagingTransport over Socket.IO. Chat-platform adapters connect to the
 * `/bridge` namespace, subscribe to the channels they serve and acknowledge
 * each `panel:*` request with `{ ok, messageId?, error? }`.
 */
@WebSocketGateway({ namespace: '/bridge', cors: { origin: '*' } })
export class ChatBridgeGateway
  implements MessagingTransport, OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(ChatBridgeGateway.name);
  private readonly socketByChannel = new Map<string, Socket>();

  constructor(
    @Inject(BRIDGE_SETTINGS) private readonly settings: BridgeSettings,
  ) {}

  handleConnection(client: Socket): void {
    if (!this.settings.token) return;
    const token = this.extractToken(client);
    if (token !== this.settings.token) {
      client.emit('auth_error', { message: 'Invalid bridge token' });
      client.disconnect(true);
    }
  }

  handleDisconnect(client: Socket): void {
    for (const [channelId, socket] of this.socketByChannel) {
      if (socket.id === client.id) this.socketByChannel.delete(channelId);
    }
  }

  @SubscribeMessage('bridge:subscribe')
  handleSubscribe(
    @ConnectedSocket() client: Socket,
    @MessageBody() body: unknown,
  ): { ok: boolean; channelIds?: string[]; error?: string } {
    const channelIds = parseChannelIds(body);
    if (!channelIds) return { ok: false, error: 'channelIds required' };
    for (const channelId of channelIds) {
      this.socketByChannel.set(channelId, client);
    }
    this.logger.log(`Bridge ${client.id} serves ${channelIds.length} channel(s)`);
    return { ok: true, channelIds };
  }

  connectedChannels(): string[] {
    return [...this.socketByChannel.keys()];
  }

  async send(channelId: string, payload: DisplayPayload): Promise<MessageRef> {
    const ack = await this.request(channelId, 'panel:send', { channelId, payload });
    if (!ack.messageId) {
      throw new TransportError(`Bridge did not return a message id for ${channelId}`);
    }
    return { channelId, messageId: ack.messageId };
  }

  async edit(ref: MessageRef, payload: DisplayPayload): Promise<void> {
    await this.request(ref.channelId, 'panel:edit', { ...ref, payload });
  }

  async delete(ref: MessageRef): Promise<void> {
    await this.request(ref.channelId, 'panel:delete', { ...ref });
  }

  private async request(
    channelId: string,
    event: string,
    body: object,
  ): Promise<{ messageId?: string }> {
    const socket = this.socketByChannel.get(channelId);
    if (!socket || !socket.connected) {
      throw new TransportError(`No chat bridge serves channel ${channelId}`);
    }
    let raw: unknown;
    try {
      raw = await socket.timeout(this.settings.ackTimeoutMs).emitWithAck(event, body);
    } catch (err) {
      throw new TransportError(`${event} to ${channelId} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const ack = parseAck(raw);
    if (!ack) throw new TransportError(`Malformed ${event} acknowledgement`);
    if (!ack.ok) {
      const detail = ack.message ?? ack.error;
      if (ack.error === 'forbidden') {
        throw new TransportPermissionError(`${event} refused in ${channelId}: ${detail}`);
      }
      throw new TransportError(`${event} failed in ${channelId}: ${detail}`);
    }
    return ack;
  }

  private extractToken(client: Socket): string | null {
    const authToken: unknown = client.handshake.auth?.token;
    if (typeof authToken === 'string' && authToken.trim()) {
      return authToken.trim();
    }

    const header = client.handshake.headers?.authorization;
    const authHeader = Array.isArray(header) ? header[0] : header;
    if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
    const token = authHeader.slice(7).trim();
    return token || null;
  }
}
