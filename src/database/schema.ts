import runQuery from './runQuery';
import logger from '../config/logger';

const TABLES = [
  `CREATE TABLE IF NOT EXISTS users (
    id BIGINT PRIMARY KEY,
    display_name VARCHAR(255) NOT NULL,
    username VARCHAR(255) NULL,
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    last_active DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS owners (
    id BIGINT PRIMARY KEY,
    username VARCHAR(255) NULL,
    business_name VARCHAR(255) NULL,
    category VARCHAR(100) NULL,
    bio TEXT NULL,
    logo_file_id VARCHAR(255) NULL,
    mode ENUM('shared', 'dedicated') NOT NULL DEFAULT 'shared',
    bot_token VARCHAR(255) NULL,
    bot_username VARCHAR(255) NULL,
    trial_start DATETIME NULL,
    trial_expired BOOLEAN NOT NULL DEFAULT FALSE,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    onboarding_step VARCHAR(20) NOT NULL DEFAULT 'name',
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS conversations (
    id BIGINT AUTO_INCREMENT PRIMARY KEY,
    user_id BIGINT NOT NULL,
    owner_id BIGINT NOT NULL,
    message_count_today INT NOT NULL DEFAULT 0,
    count_date CHAR(10) NULL,
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    last_message_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    UNIQUE KEY uniq_conversation_pair (user_id, owner_id),
    INDEX idx_conversations_owner (owner_id)
  )`,
  `CREATE TABLE IF NOT EXISTS messages (
    id BIGINT AUTO_INCREMENT PRIMARY KEY,
    conversation_id BIGINT NOT NULL,
    role ENUM('user', 'owner') NOT NULL,
    text TEXT NOT NULL,
    kind VARCHAR(20) NOT NULL DEFAULT 'text',
    origin_id BIGINT NULL,
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    INDEX idx_messages_created_at (created_at),
    CONSTRAINT fk_messages_conversation FOREIGN KEY (conversation_id)
      REFERENCES conversations (id) ON DELETE CASCADE
  )`,
  `CREATE TABLE IF NOT EXISTS forwards (
    owner_id BIGINT NOT NULL,
    channel VARCHAR(32) NOT NULL,
    forwarded_message_id BIGINT NOT NULL,
    conversation_id BIGINT NOT NULL,
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (owner_id, channel, forwarded_message_id),
    CONSTRAINT fk_forwards_conversation FOREIGN KEY (conversation_id)
      REFERENCES conversations (id) ON DELETE CASCADE
  )`
];

export const initSchema = async (): Promise<void> => {
  for (const statement of TABLES) {
    await runQuery(statement);
  }
  logger.info('Database tables ready');
};
