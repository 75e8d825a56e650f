import type {
  ChannelTransport,
  FailureListener,
  InboundEvent,
  InboundHandler,
  SentMessage,
  TransportIdentity,
  TransportStatus
} from '../channels/channel.types';

export interface SentRecord {
  chatId: number;
  text: string;
  messageId: number;
}

export const inboundEvent = (overrides: Partial<InboundEvent> = {}): InboundEvent => ({
  chatId: 500,
  senderId: 500,
  senderName: 'Test User',
  senderUsername: null,
  text: 'hello',
  kind: 'text',
  fileId: null,
  messageId: 1,
  replyToMessageId: null,
  command: null,
  ...overrides
});

/** Records sends and lets a test drive inbound events and failures by hand. */
export class FakeTransport implements ChannelTransport {
  status: TransportStatus = 'idle';
  credential: string | null = null;
  openCalls = 0;
  closeCalls = 0;
  readonly sent: SentRecord[] = [];

  /** Thrown by the next open(). */
  openError: Error | null = null;
  /** Thrown by every send() while set. */
  sendError: Error | null = null;
  /** Resolves open() only once released, when set. */
  openGate: Promise<void> | null = null;

  private handler: InboundHandler | null = null;
  private readonly failureListeners: FailureListener[] = [];
  private nextMessageId: number;

  constructor(firstMessageId = 1000) {
    this.nextMessageId = firstMessageId;
  }

  async open(credential: string): Promise<TransportIdentity> {
    this.openCalls++;
    this.credential = credential;
    this.status = 'starting';
    if (this.openGate) {
      await this.openGate;
    }
    if (this.openError) {
      this.status = 'stopped';
      throw this.openError;
    }
    this.status = 'running';
    return { botId: 7000 + this.openCalls, username: `${credential}_bot` };
  }

  subscribe(handler: InboundHandler): void {
    this.handler = handler;
  }

  onFailure(listener: FailureListener): void {
    this.failureListeners.push(listener);
  }

  async send(chatId: number, text: string): Promise<SentMessage> {
    if (this.sendError) {
      throw this.sendError;
    }
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, text, messageId });
    return { messageId };
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.status = 'stopped';
  }

  async emit(overrides: Partial<InboundEvent> = {}): Promise<void> {
    if (!this.handler) {
      throw new Error('No inbound handler subscribed');
    }
    await this.handler(inboundEvent(overrides));
  }

  crash(error: Error): void {
    this.status = 'stopped';
    for (const listener of this.failureListeners) {
      listener(error);
    }
  }

  get subscribed(): boolean {
    return this.handler !== null;
  }

  textsTo(chatId: number): string[] {
    return this.sent.filter((record) => record.chatId === chatId).map((record) => record.text);
  }
}
