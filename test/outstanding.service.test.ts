import test from 'node:test';
import assert from 'node:assert/strict';
import { NotFoundError } from '../src/infrastructure/errors.js';
import { confirmedBill, withTestCore } from './helpers/testCore.js';

test('outstanding: unknown vendor is not found', async () => {
  await withTestCore(async (core, fx) => {
    await assert.rejects(core.reports.outstandingForVendor(fx.tenantId, 999), NotFoundError);
  });
});

test('outstanding: drafts do not count until authorized', async () => {
  await withTestCore(async (core, fx) => {
    const draft = await core.bills.createDraft(fx.tenantId, {
      vendorId: fx.supplierId,
      billNumber: 'D-1',
      billDate: '2026-03-01',
      billType: 'NORMAL',
      items: [{ description: 'Goods', quantity: 3, unitPrice: '40' }],
    });
    assert.equal((await core.reports.outstandingForVendor(fx.tenantId, fx.supplierId)).outstanding, '0.00');
    await core.bills.authorize(fx.tenantId, draft.id, 7);
    assert.equal((await core.reports.outstandingForVendor(fx.tenantId, fx.supplierId)).outstanding, '120.00');
  });
});

test('outstanding: proxy to another vendor moves that share to them', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    await core.proxyBills.createProxy(fx.tenantId, {
      parentBillId: bill.id,
      vendorId: fx.customerId,
      proxyNumber: 'P-1',
      items: [{ description: 'Share', quantity: 1, unitPrice: '60' }],
    });
    await core.credits.recordPayment(fx.tenantId, {
      vendorId: fx.customerId,
      amount: '25',
      direction: 'INCOMING',
      method: 'CASH',
      date: '2026-03-05',
    });
    await core.credits.recordPayment(fx.tenantId, {
      vendorId: fx.supplierId,
      amount: '15',
      direction: 'OUTGOING',
      method: 'CASH',
      date: '2026-03-06',
    });

    assert.deepEqual(await core.reports.outstandingForVendor(fx.tenantId, fx.supplierId), {
      vendorId: fx.supplierId,
      asOf: null,
      totalBilled: '140.00',
      totalReceived: '0.00',
      totalPaidOut: '15.00',
      outstanding: '155.00',
    });
    assert.equal((await core.reports.outstandingForVendor(fx.tenantId, fx.customerId)).outstanding, '35.00');
    assert.equal(
      (await core.reports.outstandingForVendor(fx.tenantId, fx.customerId, '2026-03-04')).outstanding,
      '60.00'
    );
  });
});

test('outstanding: report lists billed vendors and flags credit limits', async () => {
  await withTestCore(async (core, fx) => {
    await core.directory.updateVendor(fx.tenantId, fx.supplierId, { creditLimit: '100' });
    await core.directory.createVendor(fx.tenantId, { name: 'Idle Vendor', type: 'BOTH' });
    await confirmedBill(core, fx, '150');

    const rows = await core.reports.outstandingReport(fx.tenantId);
    assert.deepEqual(rows, [
      {
        vendorId: fx.supplierId,
        asOf: null,
        totalBilled: '150.00',
        totalReceived: '0.00',
        totalPaidOut: '0.00',
        outstanding: '150.00',
        vendorName: 'Supplier A',
        creditLimit: '100.00',
        overCreditLimit: true,
      },
    ]);
  });
});

test('outstanding: delivery summary counts orders per status', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '100');
    const order = { billId: bill.id, deliveryUserId: 3, deliveryAddress: '1 Depot Lane', deliveryDate: '2026-03-03' };
    const a = await core.delivery.createDeliveryOrder(fx.tenantId, order);
    await core.delivery.createDeliveryOrder(fx.tenantId, order);
    await core.delivery.updateDeliveryStatus(fx.tenantId, a.id, 'IN_TRANSIT');

    assert.deepEqual(await core.reports.deliverySummary(fx.tenantId), {
      PENDING: 1,
      IN_TRANSIT: 1,
      DELIVERED: 0,
      CANCELLED: 0,
      total: 2,
    });
  });
});

test('outstanding: dashboard totals the tenant', async () => {
  await withTestCore(async (core, fx) => {
    const bill = await confirmedBill(core, fx, '200');
    await core.proxyBills.createProxy(fx.tenantId, {
      parentBillId: bill.id,
      vendorId: fx.customerId,
      proxyNumber: 'P-1',
      items: [{ description: 'Share', quantity: 1, unitPrice: '150' }],
    });
    await core.bills.createDraft(fx.tenantId, {
      vendorId: fx.supplierId,
      billNumber: 'D-1',
      billDate: '2026-03-02',
      billType: 'NORMAL',
      items: [{ description: 'Pending', quantity: 1, unitPrice: '75' }],
    });
    const entry = { method: 'CASH' as const, date: '2026-03-05' };
    await core.credits.recordPayment(fx.tenantId, { ...entry, vendorId: fx.customerId, amount: '100', direction: 'INCOMING' });
    await core.credits.recordPayment(fx.tenantId, { ...entry, vendorId: fx.supplierId, amount: '10', direction: 'OUTGOING' });

    assert.deepEqual(await core.reports.dashboard(fx.tenantId), {
      vendorCount: 2,
      billCount: 2,
      totalBilled: '200.00',
      totalReceived: '100.00',
      totalPaidOut: '10.00',
      outstanding: '110.00',
    });
    await assert.rejects(core.reports.dashboard(999), NotFoundError);
  });
});
