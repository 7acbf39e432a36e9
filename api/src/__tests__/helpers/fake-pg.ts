import { vi } from 'vitest';
import { DatabaseError, type QueryResultRow } from 'pg';
import type { PgClient } from '../../pg-store.js';

export type Statement = { text: string; values?: unknown[] };

/** Records every statement and returns no rows unless a fragment is set to fail. */
export class FakeClient implements PgClient {
  readonly statements: Statement[] = [];
  readonly release = vi.fn();
  private readonly failures: Array<{ fragment: string; err: unknown }> = [];

  failOn(fragment: string, err: unknown) {
    this.failures.push({ fragment, err });
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) {
    this.statements.push({ text, values });
    const failure = this.failures.find((f) => text.includes(f.fragment));
    if (failure) {
      throw failure.err;
    }
    const rows: R[] = [];
    return { rows };
  }

  texts() {
    return this.statements.map((s) => s.text);
  }
}

export function fakePool(client: FakeClient = new FakeClient()) {
  return { client, connect: vi.fn(async () => client) };
}

export function dbError(code: string, constraint?: string) {
  return Object.assign(new DatabaseError('database error', 0, 'error'), { code, constraint });
}
