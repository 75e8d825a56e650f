import { describe, expect, it, vi } from 'vitest';
import { UTC_SESSION_QUERY } from './database';

type QueryCallback = (error: Error | null) => void;

const mysqlMock = vi.hoisted(() => {
  const listeners: Array<(connection: unknown) => void> = [];
  return {
    listeners,
    createPool: vi.fn(() => ({
      pool: {
        on: (event: string, listener: (connection: unknown) => void) => {
          if (event === 'connection') {
            listeners.push(listener);
          }
        }
      }
    }))
  };
});

vi.mock('mysql2/promise', () => ({
  default: { createPool: mysqlMock.createPool }
}));

const connectionAnswering = (error: Error | null) => ({
  query: vi.fn((_sql: string, callback: QueryCallback) => callback(error)),
  destroy: vi.fn()
});

const connect = (connection: unknown) => {
  for (const listener of mysqlMock.listeners) {
    listener(connection);
  }
};

describe('database pool', () => {
  it('stores timestamps in UTC', () => {
    expect(mysqlMock.createPool).toHaveBeenCalledWith(expect.objectContaining({ timezone: 'Z' }));
  });

  it('switches every new connection to the UTC session zone', () => {
    const connection = connectionAnswering(null);

    connect(connection);

    expect(connection.query).toHaveBeenCalledWith("SET time_zone = '+00:00'", expect.any(Function));
    expect(UTC_SESSION_QUERY).toBe("SET time_zone = '+00:00'");
    expect(connection.destroy).not.toHaveBeenCalled();
  });

  it('drops a connection that cannot be switched', () => {
    const connection = connectionAnswering(new Error('Unknown or incorrect time zone'));

    connect(connection);

    expect(connection.destroy).toHaveBeenCalledTimes(1);
  });
});
