import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  RecordingEventSink,
  RecordingTransactionManager,
  createLogCapture,
  type LogCapture,
} from '../../testing/fakes.js';
import { isPipelineError, type PipelineError } from '../pipeline-error.js';
import { SqliteTransactionManager } from '../sqlite-transaction.js';
import { CommandPipeline } from './command-pipeline.js';
import { contextKey, type CommandContext } from './context.js';
import { StepResult } from './step-result.js';
import type {
  CommandDefinition,
  CommandPipelineStep,
  CommandStep,
  PipelinePhase,
  QueryStep,
} from './types.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

interface CreateOrder {
  customerId: string;
  sku: string;
  quantity: number;
}

interface OrderCreated {
  orderId: string;
  transactionId: string | undefined;
}

const ORDER_ID = contextKey<string>('orderId');

type OrderStep = CommandPipelineStep<CreateOrder>;

async function rejection(promise: Promise<unknown>): Promise<PipelineError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (isPipelineError(err)) return err;
    throw err;
  }
  throw new Error('expected the promise to reject');
}

// ---------------------------------------------------------------------------
// With the recording fakes
// ---------------------------------------------------------------------------

describe('CommandPipeline', () => {
  let logs: LogCapture;
  let transactions: RecordingTransactionManager;
  let eventSink: RecordingEventSink;

  beforeEach(() => {
    logs = createLogCapture();
    transactions = new RecordingTransactionManager();
    eventSink = new RecordingEventSink();
  });

  afterEach(() => {
    logs.restore();
  });

  const createOrder: CommandStep<string, CreateOrder> = {
    name: 'create-order',
    execute(context) {
      const orderId = `order-${context.command.customerId}`;
      transactions.write(`orders/${orderId}`, { sku: context.command.sku });
      context.put(ORDER_ID, orderId);
      context.addEvent({ type: 'OrderCreated', orderId });
      return StepResult.success(orderId);
    },
  };

  const reserveStock: CommandStep<void, CreateOrder> = {
    name: 'reserve-stock',
    execute(context) {
      transactions.write(`stock/${context.command.sku}`, -context.command.quantity);
      context.addEvent({ type: 'StockReserved', sku: context.command.sku });
      return StepResult.success();
    },
  };

  const checkLimit: CommandStep<void, CreateOrder> = {
    name: 'check-limit',
    execute(context) {
      return context.command.quantity > 10
        ? StepResult.failure('Order quantity exceeds limit', 'ORDER_LIMIT')
        : StepResult.success();
    },
  };

  function definition(
    overrides: Partial<CommandDefinition<CreateOrder, OrderCreated>> = {},
  ): CommandDefinition<CreateOrder, OrderCreated> {
    return {
      name: 'create-order',
      validate: (command) =>
        command.quantity > 0
          ? StepResult.success()
          : StepResult.validationFailure('Quantity must be positive'),
      initialize: (context, command) => {
        context.setActor(command.customerId);
        context.setSource('test');
      },
      steps: [createOrder, reserveStock, checkLimit],
      buildResponse: (context) => ({
        orderId: context.require(ORDER_ID),
        transactionId: context.transactionId,
      }),
      ...overrides,
    };
  }

  function pipeline(
    overrides: Partial<CommandDefinition<CreateOrder, OrderCreated>> = {},
    phases?: PipelinePhase[],
  ): CommandPipeline<CreateOrder, OrderCreated> {
    return new CommandPipeline(definition(overrides), {
      transactions,
      eventSink,
      onPhase: phases ? (phase) => phases.push(phase) : undefined,
    });
  }

  const command: CreateOrder = { customerId: 'c-1', sku: 'sku-1', quantity: 2 };

  // -----------------------------------------------------------------------
  // Success
  // -----------------------------------------------------------------------

  describe('on success', () => {
    it('commits once and returns the response', async () => {
      const response = await pipeline().execute(command);

      expect(response).toEqual({ orderId: 'order-c-1', transactionId: 'tx-1' });
      expect(transactions.calls).toEqual([
        { op: 'begin', transactionId: 'tx-1' },
        { op: 'commit', transactionId: 'tx-1' },
      ]);
      expect(transactions.committed).toEqual(
        new Map<string, unknown>([
          ['orders/order-c-1', { sku: 'sku-1' }],
          ['stock/sku-1', -2],
        ]),
      );
    });

    it('publishes the events with the audit info after commit', async () => {
      await pipeline().execute(command);

      expect(eventSink.batches).toHaveLength(1);
      const [batch] = eventSink.batches;
      expect(batch?.events).toEqual([
        { type: 'OrderCreated', orderId: 'order-c-1' },
        { type: 'StockReserved', sku: 'sku-1' },
      ]);
      expect(batch?.audit).toEqual({
        initiatedAt: expect.any(String),
        actorId: 'c-1',
        source: 'test',
        transactionId: 'tx-1',
      });
    });

    it('walks through the phases in order', async () => {
      const phases: PipelinePhase[] = [];
      await pipeline({}, phases).execute(command);

      expect(phases).toEqual([
        'CREATED',
        'VALIDATING',
        'RESOLVING_STEPS',
        'EXECUTING_STEPS',
        'BUILDING_RESPONSE',
        'COMMITTING',
        'DONE',
        'POST_EXECUTION',
      ]);
    });

    it('runs postExecution after commit and before publishing', async () => {
      const order: string[] = [];
      const tracingSink = {
        publish: () => {
          order.push('publish');
        },
      };
      const traced = new CommandPipeline(
        definition({
          postExecution: () => {
            order.push(`post-execution (open: ${String(transactions.isOpen)})`);
          },
        }),
        { transactions, eventSink: tracingSink },
      );

      await traced.execute(command);

      expect(order).toEqual(['post-execution (open: false)', 'publish']);
    });

    it('does not call the sink when no event was added', async () => {
      await pipeline({
        steps: [checkLimit],
        buildResponse: () => ({ orderId: 'none', transactionId: undefined }),
      }).execute(command);

      expect(transactions.count('commit')).toBe(1);
      expect(eventSink.batches).toHaveLength(0);
    });

    it('runs query steps inside a command', async () => {
      const readOnly: QueryStep<void, CreateOrder> = {
        name: 'read-only',
        execute(context) {
          context.put(ORDER_ID, `preview-${context.request.sku}`);
          return StepResult.success();
        },
      };
      const steps: OrderStep[] = [readOnly];

      const response = await pipeline({ steps }).execute(command);

      expect(response.orderId).toBe('preview-sku-1');
    });
  });

  // -----------------------------------------------------------------------
  // Validation
  // -----------------------------------------------------------------------

  describe('validation', () => {
    it('fails before any transaction is opened', async () => {
      const phases: PipelinePhase[] = [];
      const err = await rejection(pipeline({}, phases).execute({ ...command, quantity: 0 }));

      expect(err.toErrorPayload()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Quantity must be positive',
        classification: 'VALIDATION',
        retriable: false,
      });
      expect(transactions.calls).toEqual([]);
      expect(eventSink.batches).toHaveLength(0);
      expect(phases).toEqual(['CREATED', 'VALIDATING', 'FAILED']);
    });
  });

  // -----------------------------------------------------------------------
  // Atomicity
  // -----------------------------------------------------------------------

  describe('atomicity', () => {
    it('rolls back once and commits nothing when a later step fails', async () => {
      let postExecuted = false;
      const err = await rejection(
        pipeline({
          postExecution: () => {
            postExecuted = true;
          },
        }).execute({ ...command, quantity: 11 }),
      );

      expect(err.toErrorPayload()).toEqual({
        code: 'ORDER_LIMIT',
        message: 'Order quantity exceeds limit',
        classification: 'BUSINESS',
        retriable: false,
        step: 'check-limit',
      });
      expect(transactions.count('rollback')).toBe(1);
      expect(transactions.count('commit')).toBe(0);
      expect(transactions.committed.size).toBe(0);
      expect(eventSink.batches).toHaveLength(0);
      expect(postExecuted).toBe(false);
    });

    it('masks a thrown step error and rolls back', async () => {
      const explode: CommandStep<void, CreateOrder> = {
        name: 'explode',
        execute() {
          throw new Error('boom');
        },
      };

      const err = await rejection(pipeline({ steps: [createOrder, explode] }).execute(command));

      expect(err.message).toBe('System error during command');
      expect(err.code).toBe('SYS_001');
      expect(err.classification).toBe('SYSTEM');
      expect(JSON.stringify(err.toErrorPayload())).not.toContain('boom');
      expect(transactions.count('rollback')).toBe(1);
      expect(transactions.committed.size).toBe(0);
    });

    it('rolls back when building the response fails', async () => {
      const phases: PipelinePhase[] = [];
      const err = await rejection(
        pipeline(
          {
            buildResponse: () => {
              throw new Error('cannot serialize');
            },
          },
          phases,
        ).execute(command),
      );

      expect(err.code).toBe('SYS_001');
      expect(transactions.count('rollback')).toBe(1);
      expect(transactions.count('commit')).toBe(0);
      expect(eventSink.batches).toHaveLength(0);
      expect(phases.slice(-2)).toEqual(['BUILDING_RESPONSE', 'FAILED']);
    });

    it('rolls back when initialize fails', async () => {
      const err = await rejection(
        pipeline({
          initialize: () => {
            throw new Error('no actor');
          },
        }).execute(command),
      );

      expect(err.code).toBe('SYS_001');
      expect(transactions.calls.map((c) => c.op)).toEqual(['begin', 'rollback']);
    });

    it('masks a failed commit, rolls back and publishes nothing', async () => {
      transactions.failNext('commit', 'disk I/O error');
      let postExecuted = false;

      const err = await rejection(
        pipeline({
          postExecution: () => {
            postExecuted = true;
          },
        }).execute(command),
      );

      expect(err.toErrorPayload()).toEqual({
        code: 'SYS_001',
        message: 'System error during command',
        classification: 'SYSTEM',
        retriable: true,
      });
      expect(transactions.calls.map((c) => c.op)).toEqual(['begin', 'commit', 'rollback']);
      expect(transactions.committed.size).toBe(0);
      expect(eventSink.batches).toHaveLength(0);
      expect(postExecuted).toBe(false);
      const [logged] = logs.find('unexpected error during command');
      expect(logged?.meta).toMatchObject({ error: { message: 'disk I/O error' } });
    });

    it('surfaces the original failure when the rollback also fails', async () => {
      transactions.failNext('rollback', 'connection lost');

      const err = await rejection(pipeline().execute({ ...command, quantity: 11 }));

      expect(err.code).toBe('ORDER_LIMIT');
      const [logged] = logs.find('transaction rollback failed');
      expect(logged?.level).toBe('error');
      expect(logged?.meta).toMatchObject({
        transaction: 'tx-1',
        error: { message: 'connection lost' },
      });
    });

    it('masks a failure to begin the transaction without rolling back', async () => {
      transactions.failNext('begin');

      const err = await rejection(pipeline().execute(command));

      expect(err.code).toBe('SYS_001');
      expect(transactions.calls).toEqual([]);
    });
  });

  // -----------------------------------------------------------------------
  // After commit
  // -----------------------------------------------------------------------

  describe('after commit', () => {
    it('keeps the response when postExecution throws', async () => {
      const response = await pipeline({
        postExecution: () => {
          throw new Error('cache warmup failed');
        },
      }).execute(command);

      expect(response.orderId).toBe('order-c-1');
      expect(transactions.count('commit')).toBe(1);
      expect(eventSink.batches).toHaveLength(1);
      expect(logs.find('post-execution failed after commit')[0]?.level).toBe('error');
    });

    it('keeps the response when publishing fails', async () => {
      eventSink.failNext('broker unavailable');

      const response = await pipeline().execute(command);

      expect(response.orderId).toBe('order-c-1');
      const [logged] = logs.find('event publication failed after commit');
      expect(logged?.meta).toMatchObject({ count: 2, error: { message: 'broker unavailable' } });
    });

    it('works without an event sink', async () => {
      const noSink = new CommandPipeline(definition(), { transactions });
      await expect(noSink.execute(command)).resolves.toEqual({
        orderId: 'order-c-1',
        transactionId: 'tx-1',
      });
    });
  });

  // -----------------------------------------------------------------------
  // tryExecute
  // -----------------------------------------------------------------------

  describe('tryExecute', () => {
    it('resolves with the error payload and leaves nothing committed', async () => {
      const outcome = await pipeline().tryExecute({ ...command, quantity: 11 });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe('ORDER_LIMIT');
      }
      expect(transactions.committed.size).toBe(0);
    });

    it('runs consecutive commands in separate transactions', async () => {
      const first = await pipeline().tryExecute(command);
      const second = await pipeline().tryExecute({ ...command, customerId: 'c-2' });

      expect(first).toEqual({ ok: true, value: { orderId: 'order-c-1', transactionId: 'tx-1' } });
      expect(second).toEqual({ ok: true, value: { orderId: 'order-c-2', transactionId: 'tx-2' } });
    });
  });
});

// ---------------------------------------------------------------------------
// With a real SQLite transaction boundary
// ---------------------------------------------------------------------------

describe('CommandPipeline with SQLite', () => {
  let db: Database.Database;
  let logs: LogCapture;

  beforeEach(() => {
    logs = createLogCapture('error');
    db = new Database(':memory:');
    db.exec(`
      CREATE TABLE orders (id TEXT PRIMARY KEY, customer_id TEXT NOT NULL);
      CREATE TABLE stock (sku TEXT PRIMARY KEY, available INTEGER NOT NULL);
      INSERT INTO stock (sku, available) VALUES ('sku-1', 5);
    `);
  });

  afterEach(() => {
    db.close();
    logs.restore();
  });

  function available(sku: string): number {
    const row: unknown = db.prepare('SELECT available FROM stock WHERE sku = ?').get(sku);
    if (typeof row === 'object' && row !== null && 'available' in row) {
      return Number(row.available);
    }
    throw new Error(`no stock row for ${sku}`);
  }

  function orderCount(): number {
    const row: unknown = db.prepare('SELECT COUNT(*) AS n FROM orders').get();
    if (typeof row === 'object' && row !== null && 'n' in row) {
      return Number(row.n);
    }
    throw new Error('unexpected row shape');
  }

  function sqlitePipeline(): CommandPipeline<CreateOrder, string> {
    const insertOrder: CommandStep<void, CreateOrder> = {
      name: 'insert-order',
      execute(context) {
        const orderId = `order-${context.command.customerId}`;
        db.prepare('INSERT INTO orders (id, customer_id) VALUES (?, ?)').run(
          orderId,
          context.command.customerId,
        );
        context.put(ORDER_ID, orderId);
        return StepResult.success();
      },
    };

    const takeStock: CommandStep<void, CreateOrder> = {
      name: 'take-stock',
      execute(context) {
        const { sku, quantity } = context.command;
        db.prepare('UPDATE stock SET available = available - ? WHERE sku = ?').run(quantity, sku);
        return available(sku) < 0
          ? StepResult.failure('Insufficient stock', 'OUT_OF_STOCK')
          : StepResult.success();
      },
    };

    return new CommandPipeline<CreateOrder, string>(
      {
        name: 'create-order-sql',
        steps: [insertOrder, takeStock],
        buildResponse: (context: CommandContext<CreateOrder>) => context.require(ORDER_ID),
      },
      { transactions: new SqliteTransactionManager(db) },
    );
  }

  it('persists every write of a successful command', async () => {
    await expect(
      sqlitePipeline().execute({ customerId: 'c-1', sku: 'sku-1', quantity: 3 }),
    ).resolves.toBe('order-c-1');

    expect(orderCount()).toBe(1);
    expect(available('sku-1')).toBe(2);
    expect(db.inTransaction).toBe(false);
  });

  it('leaves no trace of earlier steps when a later step fails', async () => {
    const err = await rejection(
      sqlitePipeline().execute({ customerId: 'c-1', sku: 'sku-1', quantity: 9 }),
    );

    expect(err.code).toBe('OUT_OF_STOCK');
    expect(orderCount()).toBe(0);
    expect(available('sku-1')).toBe(5);
    expect(db.inTransaction).toBe(false);
  });

  it('serializes concurrent commands on one connection', async () => {
    const pipelineUnderTest = sqlitePipeline();

    const outcomes = await Promise.all([
      pipelineUnderTest.tryExecute({ customerId: 'c-1', sku: 'sku-1', quantity: 3 }),
      pipelineUnderTest.tryExecute({ customerId: 'c-2', sku: 'sku-1', quantity: 3 }),
    ]);

    expect(outcomes.map((o) => o.ok)).toEqual([true, false]);
    expect(orderCount()).toBe(1);
    expect(available('sku-1')).toBe(2);
  });
});
