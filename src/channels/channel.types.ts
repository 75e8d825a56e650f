import type { MessageKind } from '../types/relay.types';

export interface TransportIdentity {
  botId: number;
  username: string;
}

export interface SentMessage {
  messageId: number;
}

export interface InboundCommand {
  name: string;
  payload: string;
}

export interface InboundEvent {
  chatId: number;
  senderId: number;
  senderName: string;
  senderUsername: string | null;
  text: string;
  kind: MessageKind;
  /** Largest photo size or the document, when the message carries a file. */
  fileId: string | null;
  messageId: number;
  /** Id of the message this one replies to, when it is a reply. */
  replyToMessageId: number | null;
  command: InboundCommand | null;
}

export type InboundHandler = (event: InboundEvent) => Promise<void>;

export type FailureListener = (error: Error) => void;

export type TransportStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/**
 * One live connection for one bot credential.
 *
 * `close()` stops intake first, then waits for sends already in flight to
 * settle before resolving.
 */
export interface ChannelTransport {
  readonly status: TransportStatus;
  open(credential: string): Promise<TransportIdentity>;
  subscribe(handler: InboundHandler): void;
  send(chatId: number, text: string): Promise<SentMessage>;
  close(): Promise<void>;
  /** Called when the inbound stream dies on its own after a successful open. */
  onFailure(listener: FailureListener): void;
}

export type TransportFactory = () => ChannelTransport;
