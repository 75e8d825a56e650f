export type OnboardingStep = 'name' | 'category' | 'bio' | 'logo' | 'token' | 'done';

export interface TrialWindow {
  startedAt: Date;
  expired: boolean;
}

// Shared owners are reached through the front-door bot; dedicated owners run their own bot.
export type OwnerMode =
  | { kind: 'sharedFrontDoor' }
  | {
      kind: 'dedicatedChannel';
      credential: string | null;
      botUsername: string | null;
      trial: TrialWindow;
    };

export interface Owner {
  id: number;
  username: string | null;
  businessName: string | null;
  category: string | null;
  bio: string | null;
  logoFileId: string | null;
  mode: OwnerMode;
  isActive: boolean;
  onboardingStep: OnboardingStep;
  createdAt: Date;
}

export type OwnerFields = Partial<Omit<Owner, 'id' | 'createdAt'>>;

export interface RelayUser {
  id: number;
  displayName: string;
  username: string | null;
  createdAt: Date;
  lastActive: Date;
}

export interface Conversation {
  id: number;
  userId: number;
  ownerId: number;
  messageCountToday: number;
  countDate: string | null;
  createdAt: Date;
  lastMessageAt: Date;
}

export type MessageRole = 'user' | 'owner';
export type MessageKind = 'text' | 'photo' | 'document' | 'other';

export interface RelayMessage {
  id: number;
  conversationId: number;
  role: MessageRole;
  text: string;
  kind: MessageKind;
  originId: number | null;
  createdAt: Date;
}

export interface Forward {
  ownerId: number;
  channel: string;
  forwardedMessageId: number;
  conversationId: number;
  createdAt: Date;
}

export interface OwnerStats {
  totalUsers: number;
  totalMessages: number;
}
