import type { RowDataPacket } from 'mysql2';
import { ENUM_OWNER_MODES } from '../common/constants';
import type { OwnerModeColumn } from '../common/constants';
import type { QueryParam } from './runQuery';
import type {
  Conversation,
  MessageKind,
  MessageRole,
  OnboardingStep,
  Owner,
  OwnerFields,
  RelayMessage,
  RelayUser
} from '../types/relay.types';

export interface UserRow extends RowDataPacket {
  id: number;
  display_name: string;
  username: string | null;
  created_at: Date;
  last_active: Date;
}

export interface OwnerColumns {
  id: number;
  username: string | null;
  business_name: string | null;
  category: string | null;
  bio: string | null;
  logo_file_id: string | null;
  mode: OwnerModeColumn;
  bot_token: string | null;
  bot_username: string | null;
  trial_start: Date | null;
  trial_expired: number | boolean;
  is_active: number | boolean;
  onboarding_step: OnboardingStep;
  created_at: Date;
}

export interface OwnerRow extends RowDataPacket, OwnerColumns {}

export interface ConversationRow extends RowDataPacket {
  id: number;
  user_id: number;
  owner_id: number;
  message_count_today: number;
  count_date: string | null;
  created_at: Date;
  last_message_at: Date;
}

export interface MessageRow extends RowDataPacket {
  id: number;
  conversation_id: number;
  role: MessageRole;
  text: string;
  kind: MessageKind;
  origin_id: number | null;
  created_at: Date;
}

export const toUser = (row: UserRow): RelayUser => ({
  id: Number(row.id),
  displayName: row.display_name,
  username: row.username,
  createdAt: row.created_at,
  lastActive: row.last_active
});

export const toOwner = (row: OwnerColumns): Owner => ({
  id: Number(row.id),
  username: row.username,
  businessName: row.business_name,
  category: row.category,
  bio: row.bio,
  logoFileId: row.logo_file_id,
  // trial columns survive a switch back to shared mode but are only surfaced for dedicated owners
  mode: row.mode === ENUM_OWNER_MODES.DEDICATED
    ? {
        kind: 'dedicatedChannel',
        credential: row.bot_token,
        botUsername: row.bot_username,
        trial: {
          startedAt: row.trial_start ?? row.created_at,
          expired: Boolean(row.trial_expired)
        }
      }
    : { kind: 'sharedFrontDoor' },
  isActive: Boolean(row.is_active),
  onboardingStep: row.onboarding_step,
  createdAt: row.created_at
});

export const toConversation = (row: ConversationRow): Conversation => ({
  id: Number(row.id),
  userId: Number(row.user_id),
  ownerId: Number(row.owner_id),
  messageCountToday: row.message_count_today,
  countDate: row.count_date,
  createdAt: row.created_at,
  lastMessageAt: row.last_message_at
});

export const toMessage = (row: MessageRow): RelayMessage => ({
  id: Number(row.id),
  conversationId: Number(row.conversation_id),
  role: row.role,
  text: row.text,
  kind: row.kind,
  originId: row.origin_id === null ? null : Number(row.origin_id),
  createdAt: row.created_at
});

export interface ColumnAssignment {
  column: string;
  value: QueryParam;
  /** Expression used when the row already exists (UPDATE / ON DUPLICATE KEY UPDATE). */
  merge: string;
}

const assign = (column: string, value: QueryParam): ColumnAssignment => ({
  column,
  value,
  merge: `${column} = ?`
});

/**
 * Column assignments for an owner write. A trial start is never moved once
 * set and the expired flag can only be raised.
 */
export const ownerAssignments = (fields: OwnerFields): ColumnAssignment[] => {
  const assignments: ColumnAssignment[] = [];

  if (fields.username !== undefined) assignments.push(assign('username', fields.username));
  if (fields.businessName !== undefined) assignments.push(assign('business_name', fields.businessName));
  if (fields.category !== undefined) assignments.push(assign('category', fields.category));
  if (fields.bio !== undefined) assignments.push(assign('bio', fields.bio));
  if (fields.logoFileId !== undefined) assignments.push(assign('logo_file_id', fields.logoFileId));
  if (fields.isActive !== undefined) assignments.push(assign('is_active', fields.isActive));
  if (fields.onboardingStep !== undefined) assignments.push(assign('onboarding_step', fields.onboardingStep));

  const mode = fields.mode;
  if (mode) {
    switch (mode.kind) {
      case 'sharedFrontDoor':
        assignments.push(
          assign('mode', ENUM_OWNER_MODES.SHARED),
          assign('bot_token', null),
          assign('bot_username', null)
        );
        break;
      case 'dedicatedChannel':
        assignments.push(
          assign('mode', ENUM_OWNER_MODES.DEDICATED),
          assign('bot_token', mode.credential),
          assign('bot_username', mode.botUsername),
          {
            column: 'trial_start',
            value: mode.trial.startedAt,
            merge: 'trial_start = COALESCE(trial_start, ?)'
          },
          {
            column: 'trial_expired',
            value: mode.trial.expired,
            merge: 'trial_expired = (trial_expired OR ?)'
          }
        );
        break;
    }
  }

  return assignments;
};
