import type { ResultSetHeader, RowDataPacket } from 'mysql2';
import runQuery from '../database/runQuery';
import {
  ConversationRow,
  MessageRow,
  OwnerRow,
  UserRow,
  ownerAssignments,
  toConversation,
  toMessage,
  toOwner,
  toUser
} from '../database/mappers';
import type { QuotaDecision, RecordStore } from '../types/store.types';
import type {
  Conversation,
  MessageKind,
  MessageRole,
  Owner,
  OwnerFields,
  OwnerStats,
  RelayMessage,
  RelayUser
} from '../types/relay.types';

interface CountRow extends RowDataPacket {
  count: number;
}

interface IdRow extends RowDataPacket {
  id: number;
}

export class MySqlRecordStore implements RecordStore {
  async upsertUser(id: number, displayName: string, username: string | null = null): Promise<RelayUser> {
    const query = `
      INSERT INTO users (id, display_name, username)
      VALUES (?, ?, ?)
      ON DUPLICATE KEY UPDATE
        display_name = ?,
        username = ?,
        last_active = CURRENT_TIMESTAMP
    `;
    await runQuery<ResultSetHeader>(query, [id, displayName, username, displayName, username]);

    const result = await runQuery<UserRow[]>('SELECT * FROM users WHERE id = ?', [id]);
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Failed to upsert user ${id}`);
    }
    return toUser(row);
  }

  async getOwner(id: number): Promise<Owner | null> {
    const result = await runQuery<OwnerRow[]>('SELECT * FROM owners WHERE id = ?', [id]);
    const row = result.rows[0];
    return row ? toOwner(row) : null;
  }

  async upsertOwner(id: number, fields: OwnerFields): Promise<Owner> {
    const assignments = ownerAssignments(fields);
    const columns = ['id', ...assignments.map((a) => a.column)];
    const placeholders = columns.map(() => '?').join(', ');
    // a no-op merge keeps ON DUPLICATE KEY UPDATE valid when no field is given
    const merges = assignments.length > 0 ? assignments.map((a) => a.merge).join(', ') : 'id = id';

    const query = `
      INSERT INTO owners (${columns.join(', ')})
      VALUES (${placeholders})
      ON DUPLICATE KEY UPDATE ${merges}
    `;
    await runQuery<ResultSetHeader>(query, [
      id,
      ...assignments.map((a) => a.value),
      ...assignments.map((a) => a.value)
    ]);

    const owner = await this.getOwner(id);
    if (!owner) {
      throw new Error(`Failed to upsert owner ${id}`);
    }
    return owner;
  }

  async updateOwner(id: number, delta: OwnerFields): Promise<Owner | null> {
    const assignments = ownerAssignments(delta);
    if (assignments.length === 0) {
      return this.getOwner(id);
    }

    const query = `UPDATE owners SET ${assignments.map((a) => a.merge).join(', ')} WHERE id = ?`;
    await runQuery<ResultSetHeader>(query, [...assignments.map((a) => a.value), id]);
    return this.getOwner(id);
  }

  async listOwners(): Promise<Owner[]> {
    const result = await runQuery<OwnerRow[]>('SELECT * FROM owners ORDER BY created_at DESC');
    return result.rows.map(toOwner);
  }

  async listActiveDedicatedOwners(): Promise<Owner[]> {
    const query = `
      SELECT * FROM owners
      WHERE mode = 'dedicated'
      AND bot_token IS NOT NULL
      AND is_active = TRUE
      AND trial_expired = FALSE
    `;
    const result = await runQuery<OwnerRow[]>(query);
    return result.rows.map(toOwner);
  }

  async getOrCreateConversation(userId: number, ownerId: number): Promise<Conversation> {
    const query = `
      INSERT INTO conversations (user_id, owner_id)
      VALUES (?, ?)
      ON DUPLICATE KEY UPDATE last_message_at = CURRENT_TIMESTAMP
    `;
    await runQuery<ResultSetHeader>(query, [userId, ownerId]);

    const conversation = await this.findConversation(userId, ownerId);
    if (!conversation) {
      throw new Error(`Failed to create conversation ${userId}:${ownerId}`);
    }
    return conversation;
  }

  async findConversation(userId: number, ownerId: number): Promise<Conversation | null> {
    const result = await runQuery<ConversationRow[]>(
      'SELECT * FROM conversations WHERE user_id = ? AND owner_id = ?',
      [userId, ownerId]
    );
    const row = result.rows[0];
    return row ? toConversation(row) : null;
  }

  async appendMessage(
    conversationId: number,
    role: MessageRole,
    text: string,
    kind: MessageKind,
    originId: number | null
  ): Promise<RelayMessage> {
    const query = `
      INSERT INTO messages (conversation_id, role, text, kind, origin_id)
      VALUES (?, ?, ?, ?, ?)
    `;
    const inserted = await runQuery<ResultSetHeader>(query, [conversationId, role, text, kind, originId]);

    const result = await runQuery<MessageRow[]>('SELECT * FROM messages WHERE id = ?', [inserted.rows.insertId]);
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Failed to append message to conversation ${conversationId}`);
    }
    return toMessage(row);
  }

  async tryConsumeDailyQuota(userId: number, ownerId: number, cap: number, today: string): Promise<QuotaDecision> {
    // single statement: MySQL evaluates SET left to right, so the count sees the old count_date
    const query = `
      UPDATE conversations
      SET message_count_today = IF(count_date = ?, message_count_today + 1, 1),
          count_date = ?,
          last_message_at = CURRENT_TIMESTAMP
      WHERE user_id = ? AND owner_id = ?
      AND (count_date IS NULL OR count_date <> ? OR message_count_today < ?)
    `;
    const result = await runQuery<ResultSetHeader>(query, [today, today, userId, ownerId, today, cap]);
    return result.rows.affectedRows === 1 ? 'allowed' : 'denied';
  }

  async markTrialExpired(ownerId: number): Promise<boolean> {
    const query = `
      UPDATE owners SET trial_expired = TRUE
      WHERE id = ? AND mode = 'dedicated' AND trial_expired = FALSE
    `;
    const result = await runQuery<ResultSetHeader>(query, [ownerId]);
    return result.rows.affectedRows === 1;
  }

  async purgeMessagesOlderThan(retentionMs: number, now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - retentionMs);
    const result = await runQuery<ResultSetHeader>('DELETE FROM messages WHERE created_at < ?', [cutoff]);
    return result.rows.affectedRows;
  }

  async recordForward(ownerId: number, channel: string, forwardedMessageId: number, conversationId: number): Promise<void> {
    const query = `
      INSERT INTO forwards (owner_id, channel, forwarded_message_id, conversation_id)
      VALUES (?, ?, ?, ?)
      ON DUPLICATE KEY UPDATE conversation_id = ?
    `;
    await runQuery<ResultSetHeader>(query, [ownerId, channel, forwardedMessageId, conversationId, conversationId]);
  }

  async findForward(ownerId: number, channel: string, forwardedMessageId: number): Promise<Conversation | null> {
    const query = `
      SELECT c.* FROM forwards f
      JOIN conversations c ON c.id = f.conversation_id
      WHERE f.owner_id = ? AND f.channel = ? AND f.forwarded_message_id = ?
    `;
    const result = await runQuery<ConversationRow[]>(query, [ownerId, channel, forwardedMessageId]);
    const row = result.rows[0];
    return row ? toConversation(row) : null;
  }

  async getOwnerStats(ownerId: number): Promise<OwnerStats> {
    const [users, messages] = await Promise.all([
      runQuery<CountRow[]>(
        'SELECT COUNT(DISTINCT user_id) AS count FROM conversations WHERE owner_id = ?',
        [ownerId]
      ),
      runQuery<CountRow[]>(
        `SELECT COUNT(*) AS count FROM messages m
         JOIN conversations c ON m.conversation_id = c.id
         WHERE c.owner_id = ?`,
        [ownerId]
      )
    ]);

    return {
      totalUsers: Number(users.rows[0]?.count ?? 0),
      totalMessages: Number(messages.rows[0]?.count ?? 0)
    };
  }

  async listRecentMessages(ownerId: number, limit: number): Promise<RelayMessage[]> {
    // LIMIT placeholders are unreliable with prepared statements, so the bound is inlined as an integer
    const bounded = Math.max(1, Math.min(500, Math.floor(limit)));
    const query = `
      SELECT m.* FROM messages m
      JOIN conversations c ON m.conversation_id = c.id
      WHERE c.owner_id = ?
      ORDER BY m.created_at DESC, m.id DESC
      LIMIT ${bounded}
    `;
    const result = await runQuery<MessageRow[]>(query, [ownerId]);
    return result.rows.map(toMessage);
  }

  async listUserIds(): Promise<number[]> {
    const result = await runQuery<IdRow[]>('SELECT id FROM users');
    return result.rows.map((row) => Number(row.id));
  }

  async listDedicatedUserIds(): Promise<number[]> {
    const query = `
      SELECT DISTINCT c.user_id AS id FROM conversations c
      JOIN owners o ON c.owner_id = o.id
      WHERE o.mode = 'dedicated'
    `;
    const result = await runQuery<IdRow[]>(query);
    return result.rows.map((row) => Number(row.id));
  }
}
