import type { QueryResult, QueryResultRow } from 'pg';
import { isTransientConnectionError, TransactionClient, TransactionPool, withTransaction } from '../connection';

class FakeClient implements TransactionClient {
  readonly statements: string[] = [];
  released = false;

  async query<R extends QueryResultRow = QueryResultRow>(text: string): Promise<QueryResult<R>> {
    this.statements.push(text);
    return { command: text, rowCount: 0, oid: 0, fields: [], rows: [] };
  }

  release(): void {
    this.released = true;
  }
}

/** Hands out clients, failing the first connects with the given errors. */
class FakePool implements TransactionPool {
  readonly clients: FakeClient[] = [];
  connects = 0;

  constructor(private readonly connectFailures: Error[] = []) {}

  async connect(): Promise<TransactionClient> {
    this.connects++;
    const failure = this.connectFailures.shift();
    if (failure) {
      throw failure;
    }
    const client = new FakeClient();
    this.clients.push(client);
    return client;
  }
}

const connectionReset = () => Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });

describe('withTransaction', () => {
  it('commits the handler result on the checked-out client', async () => {
    const pool = new FakePool();

    const result = await withTransaction(pool, async (client) => {
      await client.query('UPDATE attempts SET status = $1', ['completed']);
      return 'done';
    });

    expect(result).toBe('done');
    expect(pool.clients[0].statements).toEqual(['BEGIN', 'UPDATE attempts SET status = $1', 'COMMIT']);
    expect(pool.clients[0].released).toBe(true);
  });

  it('rolls back and rethrows when the handler fails', async () => {
    const pool = new FakePool();

    await expect(
      withTransaction(pool, async (client) => {
        await client.query('INSERT INTO answers DEFAULT VALUES');
        throw new Error('Attempt already completed');
      })
    ).rejects.toThrow('Attempt already completed');

    expect(pool.connects).toBe(1);
    expect(pool.clients[0].statements).toEqual(['BEGIN', 'INSERT INTO answers DEFAULT VALUES', 'ROLLBACK']);
    expect(pool.clients[0].released).toBe(true);
  });

  it('retries after a connection reset', async () => {
    const pool = new FakePool([connectionReset()]);
    const handler = jest.fn(async () => 42);

    await expect(withTransaction(pool, handler)).resolves.toBe(42);

    expect(pool.connects).toBe(2);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(pool.clients[0].statements).toEqual(['BEGIN', 'COMMIT']);
  });

  it('does not retry other errors', async () => {
    const pool = new FakePool([new Error('password authentication failed')]);

    await expect(withTransaction(pool, async () => 1)).rejects.toThrow('password authentication failed');
    expect(pool.connects).toBe(1);
  });
});

describe('isTransientConnectionError', () => {
  it('recognises dropped connections by code or message', () => {
    expect(isTransientConnectionError(connectionReset())).toBe(true);
    expect(isTransientConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true);
    expect(isTransientConnectionError(new Error('syntax error at or near "SELEC"'))).toBe(false);
    expect(isTransientConnectionError('ECONNRESET')).toBe(false);
  });
});
