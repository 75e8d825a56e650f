import mysql from 'mysql2/promise';
import dotenv from 'dotenv';
import logger from './logger';

dotenv.config();

export const UTC_SESSION_QUERY = "SET time_zone = '+00:00'";

export const pool = mysql.createPool({
  host: process.env.DB_HOST || 'localhost',
  user: process.env.DB_USER || 'root',
  password: process.env.DB_PASSWORD || '',
  database: process.env.DB_NAME || 'tenant_relay',
  port: parseInt(process.env.DB_PORT || '3306'),
  waitForConnections: true,
  connectionLimit: 10,
  queueLimit: 0,
  // all DATETIME columns hold UTC
  timezone: 'Z'
});

// CURRENT_TIMESTAMP defaults follow the session zone, which has to agree with `timezone` above
pool.pool.on('connection', (connection) => {
  connection.query(UTC_SESSION_QUERY, (error) => {
    if (error) {
      logger.error({ err: error }, 'Failed to switch connection to UTC');
      connection.destroy();
    }
  });
});
