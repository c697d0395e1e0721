import test from 'node:test';
import assert from 'node:assert/strict';
import {
  CapacityExceededError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  TransientError,
  ValidationError,
} from '../src/infrastructure/errors.js';
import { FakeLockClient, confirmedBill, withTestCore } from './helpers/testCore.js';

const split = (vendorId: number, amount: string, proxyNumber = `P-${amount}`) => ({
  vendorId,
  proxyNumber,
  items: [{ description: 'Share', quantity: 1, unitPrice: amount }],
});

test('proxy bills: only confirmed parents can be split', async () => {
  await withTestCore(async (core, fx) => {
    const draft = await core.bills.createDraft(fx.tenantId, {
      vendorId: fx.supplierId,
      billNumber: 'D-1',
      billDate: '2026-03-01',
      billType: 'NORMAL',
      items: [{ description: 'Goods', quantity: 1, unitPrice: '100' }],
    });
    await assert.rejects(
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: draft.id, ...split(fx.customerId, '10') }),
      (err: unknown) => err instanceof InvalidStateError && err.message === 'cannot split a DRAFT bill'
    );
    await assert.rejects(
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: 999, ...split(fx.customerId, '10') }),
      NotFoundError
    );
  });
});

test('proxy bills: ceiling is the parent total, boundary included', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    const first = await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '150') });
    assert.equal(first.status, 'CONFIRMED');
    assert.equal(first.amountTotal, '150.00');
    assert.equal(first.items[0]?.amount, '150.00');

    await assert.rejects(
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '60') }),
      (err: unknown) =>
        err instanceof CapacityExceededError &&
        err.details?.['remaining'] === '50.00' &&
        err.details?.['requested'] === '60.00'
    );
    await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.supplierId, '50') });
    assert.deepEqual(await core.proxyBills.remainingCapacity(fx.tenantId, bill.id), {
      parentBillId: bill.id,
      parentTotal: '200.00',
      allocated: '200.00',
      remaining: '0.00',
    });
  });
});

test('proxy bills: cancelling a proxy frees its capacity', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    const proxy = await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '150') });
    const cancelled = await core.proxyBills.cancelProxy(fx.tenantId, proxy.id);
    assert.equal(cancelled.status, 'CANCELLED');
    assert.equal((await core.proxyBills.remainingCapacity(fx.tenantId, bill.id)).remaining, '200.00');
    await assert.rejects(core.proxyBills.cancelProxy(fx.tenantId, proxy.id), InvalidStateError);

    await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '180') });
    const listed = await core.proxyBills.listProxyBills(fx.tenantId, bill.id);
    assert.deepEqual(
      listed.map((p) => [p.amountTotal, p.status]),
      [
        ['150.00', 'CANCELLED'],
        ['180.00', 'CONFIRMED'],
      ]
    );
  });
});

test('proxy bills: a proxy with payments cannot be cancelled', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    const proxy = await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '80') });
    await core.credits.recordPayment(fx.tenantId, {
      vendorId: fx.customerId,
      proxyBillId: proxy.id,
      amount: '80',
      direction: 'INCOMING',
      method: 'UPI',
      date: '2026-03-05',
    });
    await assert.rejects(core.proxyBills.cancelProxy(fx.tenantId, proxy.id), ConflictError);
  });
});

test('proxy bills: parent cancel waits for its proxies to be cancelled', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    const proxy = await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '60') });
    await assert.rejects(
      core.bills.cancel(fx.tenantId, bill.id),
      (err: unknown) => err instanceof ConflictError && err.message === 'bill has active proxy bills'
    );
    await core.proxyBills.cancelProxy(fx.tenantId, proxy.id);
    assert.equal((await core.bills.cancel(fx.tenantId, bill.id)).status, 'CANCELLED');
  });
});

test('proxy bills: vendor must belong to the tenant', async () => {
  await withTestCore(async (core, fx) => {
    const other = await core.directory.createTenant({ name: 'Other', code: 'T2' });
    const foreign = await core.directory.createVendor(other.id, { name: 'Foreign', type: 'CUSTOMER' });
    const bill = await confirmedBill(core, fx, '200');
    await assert.rejects(
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(foreign.id, '10') }),
      ValidationError
    );
  });
});

test('proxy bills: a batch of splits is checked as a whole', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '100');
    await assert.rejects(
      core.proxyBills.createProxySplits(fx.tenantId, bill.id, [split(fx.customerId, '60'), split(fx.supplierId, '50')]),
      CapacityExceededError
    );
    assert.deepEqual(await core.proxyBills.listProxyBills(fx.tenantId, bill.id), []);

    const created = await core.proxyBills.createProxySplits(fx.tenantId, bill.id, [
      split(fx.customerId, '60'),
      split(fx.supplierId, '40'),
    ]);
    assert.deepEqual(
      created.map((p) => p.amountTotal),
      ['60.00', '40.00']
    );
    await assert.rejects(core.proxyBills.createProxySplits(fx.tenantId, bill.id, []), ValidationError);
  });
});

test('proxy bills: concurrent splits never exceed the parent total', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '100');
    const results = await Promise.allSettled([
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '80', 'P-A') }),
      core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '80', 'P-B') }),
    ]);
    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    assert.equal(fulfilled.length, 1);
    assert.equal(rejected.length, 1);
    assert.ok(rejected[0]?.reason instanceof CapacityExceededError);
    assert.equal((await core.proxyBills.remainingCapacity(fx.tenantId, bill.id)).allocated, '80.00');
  });
});

test('proxy bills: takes and releases the split lock when redis is configured', async () => {
  const redis = new FakeLockClient();
  await withTestCore(
    async (core, fx) => {
      const bill = await confirmedBill(core, fx, '100');
      const key = `lock:proxy-split:${fx.tenantId}:${bill.id}`;
      await core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '10') });
      assert.deepEqual(redis.released, [key]);
      assert.equal(redis.keys.size, 0);

      redis.keys.set(key, 'held-elsewhere');
      await assert.rejects(
        core.proxyBills.createProxy(fx.tenantId, { parentBillId: bill.id, ...split(fx.customerId, '10') }),
        (err: unknown) => err instanceof TransientError && err.message === 'resource is locked'
      );
    },
    { redis }
  );
});
