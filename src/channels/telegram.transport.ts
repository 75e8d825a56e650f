import { Bot } from 'grammy';
import { componentLogger } from '../config/logger';
import { TransportError } from '../common/errors';
import type {
  ChannelTransport,
  FailureListener,
  InboundHandler,
  SentMessage,
  TransportIdentity,
  TransportStatus
} from './channel.types';
import { toInboundEvent, toTransportError } from './telegram.events';

const transportLogger = componentLogger('telegram');

/**
 * A grammy bot on long polling. Each instance polls on its own and hands
 * every incoming message to the subscribed handler.
 */
export class TelegramTransport implements ChannelTransport {
  private bot: Bot | null = null;
  private handler: InboundHandler | null = null;
  private readonly failureListeners: FailureListener[] = [];
  private readonly inFlight = new Set<Promise<unknown>>();
  private polling: Promise<void> | null = null;
  private _status: TransportStatus = 'idle';

  get status(): TransportStatus {
    return this._status;
  }

  async open(credential: string): Promise<TransportIdentity> {
    if (this._status !== 'idle') {
      throw new Error(`Transport cannot be opened from state ${this._status}`);
    }
    this._status = 'starting';

    const bot = new Bot(credential);
    try {
      // getMe doubles as the credential check
      await bot.init();
    } catch (error) {
      this._status = 'stopped';
      throw toTransportError(error);
    }
    if (this.closedWhileOpening()) {
      throw new TransportError('Unreachable', 'Transport was closed while opening');
    }

    const identity: TransportIdentity = { botId: bot.botInfo.id, username: bot.botInfo.username };
    const log = transportLogger.child({ bot: identity.username });

    bot.on('message', async (ctx) => {
      const handler = this.handler;
      if (!handler || this._status !== 'running') {
        return;
      }
      await handler(toInboundEvent(ctx.message));
    });

    bot.catch((err) => {
      log.error({ err: err.error, updateId: err.ctx.update.update_id }, 'Inbound handler failed');
    });

    this.bot = bot;
    this._status = 'running';
    this.polling = bot.start({ allowed_updates: ['message'] }).catch((error: unknown) => {
      if (this._status === 'stopping' || this._status === 'stopped') {
        log.warn({ err: error }, 'Polling ended with an error during close');
        return;
      }
      this._status = 'stopped';
      const failure = toTransportError(error);
      log.error({ err: failure, kind: failure.kind }, 'Polling stopped unexpectedly');
      for (const listener of this.failureListeners) {
        listener(failure);
      }
    });

    log.info({ botId: identity.botId }, 'Telegram transport opened');
    return identity;
  }

  subscribe(handler: InboundHandler): void {
    this.handler = handler;
  }

  onFailure(listener: FailureListener): void {
    this.failureListeners.push(listener);
  }

  // Sends stay possible while closing so events that captured this transport can finish
  async send(chatId: number, text: string): Promise<SentMessage> {
    const bot = this.bot;
    if (!bot) {
      throw new TransportError('Unreachable', 'Transport is not open');
    }

    const pending = bot.api.sendMessage(chatId, text);
    this.inFlight.add(pending);
    try {
      const sent = await pending;
      return { messageId: sent.message_id };
    } catch (error) {
      throw toTransportError(error);
    } finally {
      this.inFlight.delete(pending);
    }
  }

  private closedWhileOpening(): boolean {
    return this._status === 'stopped';
  }

  async close(): Promise<void> {
    if (this._status === 'idle' || this._status === 'starting') {
      // an open() still waiting on getMe sees this and gives up
      this._status = 'stopped';
      return;
    }
    const bot = this.bot;
    if (!bot || this._status === 'stopping' || this._status === 'stopped') {
      return;
    }
    this._status = 'stopping';

    try {
      if (bot.isRunning()) {
        await bot.stop();
      }
      await this.polling;
      await Promise.allSettled([...this.inFlight]);
    } finally {
      this._status = 'stopped';
      transportLogger.info({ bot: bot.botInfo.username }, 'Telegram transport closed');
    }
  }
}
