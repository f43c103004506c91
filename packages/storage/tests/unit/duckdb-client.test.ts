/**
 * Tests for DuckDBClient connection lifecycle
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DuckDBClient, sqlString } from '../../src/duckdb/duckdb-client.js';

const native = vi.hoisted(() => {
  const connection = {
    run: vi.fn(async () => undefined),
    closeSync: vi.fn(),
  };
  const instance = {
    connect: vi.fn(async () => connection),
    closeSync: vi.fn(),
  };
  return { connection, instance, create: vi.fn(async () => instance) };
});

vi.mock('@duckdb/node-api', () => ({
  DuckDBInstance: { create: native.create },
}));

describe('DuckDBClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('opens one instance and reuses its connection', async () => {
    const client = new DuckDBClient();

    await client.execute('CREATE TABLE t (x INTEGER)');
    await client.execute('INSERT INTO t VALUES (1)');

    expect(native.create).toHaveBeenCalledTimes(1);
    expect(native.create).toHaveBeenCalledWith(':memory:');
    expect(native.connection.run).toHaveBeenCalledTimes(2);
  });

  it('closes the connection and the instance', async () => {
    const client = new DuckDBClient();
    await client.execute('SELECT 1');

    client.close();

    expect(native.connection.closeSync).toHaveBeenCalledTimes(1);
    expect(native.instance.closeSync).toHaveBeenCalledTimes(1);
  });

  it('closes only once and reopens on the next statement', async () => {
    const client = new DuckDBClient();
    await client.execute('SELECT 1');
    client.close();
    client.close();

    expect(native.instance.closeSync).toHaveBeenCalledTimes(1);

    await client.execute('SELECT 2');
    expect(native.create).toHaveBeenCalledTimes(2);
  });

  it('does nothing when closed before connecting', () => {
    new DuckDBClient().close();

    expect(native.connection.closeSync).not.toHaveBeenCalled();
    expect(native.instance.closeSync).not.toHaveBeenCalled();
  });

  it('rejects an empty statement', async () => {
    await expect(new DuckDBClient().execute('   ')).rejects.toThrow('SQL query is empty');
  });

  it('escapes quotes in string literals', () => {
    expect(sqlString("O'Brien")).toBe("'O''Brien'");
  });
});
