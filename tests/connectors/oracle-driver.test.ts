import { describe, it, expect, vi } from 'vitest';

const { fakeOracledb, connection } = vi.hoisted(() => {
  const connection = {
    callTimeout: 0,
    execute: vi.fn(async () => ({ rows: [['HR', 'EMP']] })),
    close: vi.fn(async () => {}),
  };
  const fakeOracledb = {
    OUT_FORMAT_ARRAY: 4001,
    STRING: 2001,
    BUFFER: 2006,
    DB_TYPE_VARCHAR: { name: 'DB_TYPE_VARCHAR' },
    DB_TYPE_NUMBER: { name: 'DB_TYPE_NUMBER' },
    DB_TYPE_CLOB: { name: 'DB_TYPE_CLOB' },
    DB_TYPE_NCLOB: { name: 'DB_TYPE_NCLOB' },
    DB_TYPE_BLOB: { name: 'DB_TYPE_BLOB' },
    getConnection: vi.fn(async () => connection),
    initOracleClient: vi.fn(),
  };
  return { fakeOracledb, connection };
});

vi.mock('oracledb', () => ({ default: fakeOracledb }));

import { fetchTypeHandler, nodeOracleDriver } from '../../src/connectors/oracle.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('nodeOracleDriver', () => {
  it('fetches rows as arrays with LOBs and numbers materialized', async () => {
    const attributes = { user: 'auditor', password: 'test-password', connectString: 'db.internal:1521/ORCL' };

    const session = await nodeOracleDriver.getConnection(attributes);
    const rows = await session.execute('SELECT OWNER, TABLE_NAME FROM DBA_TABLES');

    expect(fakeOracledb.getConnection).toHaveBeenCalledWith(attributes);
    expect(connection.execute).toHaveBeenCalledWith('SELECT OWNER, TABLE_NAME FROM DBA_TABLES', [], {
      outFormat: 4001,
      fetchTypeHandler,
    });
    expect(rows).toEqual([['HR', 'EMP']]);
  });

  it('sets the call timeout on the connection', async () => {
    const session = await nodeOracleDriver.getConnection({
      user: 'auditor',
      password: 'test-password',
      connectString: 'SALES',
    });

    session.setCallTimeout(5000);

    expect(connection.callTimeout).toBe(5000);
  });

  it('loads the client libraries once per process', () => {
    nodeOracleDriver.initThickClient('/opt/oracle/instantclient');
    nodeOracleDriver.initThickClient('/opt/oracle/instantclient');

    expect(fakeOracledb.initOracleClient).toHaveBeenCalledTimes(1);
    expect(fakeOracledb.initOracleClient).toHaveBeenCalledWith({ libDir: '/opt/oracle/instantclient' });
    expect(() => nodeOracleDriver.initThickClient('/usr/lib/oracle')).toThrow(ConfigurationError);
    expect(() => nodeOracleDriver.initThickClient('/usr/lib/oracle')).toThrow(
      'Oracle Client already loaded from /opt/oracle/instantclient'
    );
  });
});

describe('fetchTypeHandler', () => {
  it('fetches character LOBs and numbers as strings', () => {
    expect(fetchTypeHandler({ dbType: fakeOracledb.DB_TYPE_CLOB })).toEqual({ type: 2001 });
    expect(fetchTypeHandler({ dbType: fakeOracledb.DB_TYPE_NCLOB })).toEqual({ type: 2001 });
    expect(fetchTypeHandler({ dbType: fakeOracledb.DB_TYPE_NUMBER })).toEqual({ type: 2001 });
  });

  it('fetches binary LOBs as buffers', () => {
    expect(fetchTypeHandler({ dbType: fakeOracledb.DB_TYPE_BLOB })).toEqual({ type: 2006 });
  });

  it('leaves other column types alone', () => {
    expect(fetchTypeHandler({ dbType: fakeOracledb.DB_TYPE_VARCHAR })).toBeUndefined();
  });
});
