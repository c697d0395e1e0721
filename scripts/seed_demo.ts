import { createBillingCoreFromEnv } from '../src/index.js';
import { todayDateOnly } from '../src/utils/date.js';

/**
 * Seed a demo tenant: one supplier bill split into a proxy, a payment, and a delivery.
 * Safe to run once per database; a second run stops on the tenant code conflict.
 */
async function seedDemo() {
  const core = await createBillingCoreFromEnv();
  try {
    console.log('🌱 Seeding demo tenant...');
    const today = todayDateOnly();

    const tenant = await core.directory.createTenant({ name: 'Demo Traders', code: 'DEMO' });
    const supplier = await core.directory.createVendor(tenant.id, {
      name: 'Demo Supplier',
      type: 'SUPPLIER',
      creditLimit: '5000',
    });
    const customer = await core.directory.createVendor(tenant.id, { name: 'Demo Customer', type: 'BOTH' });
    console.log(`  ✅ Tenant ${tenant.id} with vendors ${supplier.id}, ${customer.id}`);

    const draft = await core.bills.createDraft(tenant.id, {
      vendorId: supplier.id,
      billNumber: 'DEMO-0001',
      billDate: today,
      billType: 'NORMAL',
      items: [
        { description: 'Rice 25kg', quantity: 4, unitPrice: '120.00' },
        { description: 'Cooking oil 5L', quantity: 2, unitPrice: '45.50' },
      ],
      amountTax: '28.00',
    });
    const bill = await core.bills.authorize(tenant.id, draft.id, 1);
    console.log(`  ✅ Bill ${bill.billNumber} confirmed, total ${bill.amountTotal}`);

    const proxy = await core.proxyBills.createProxy(tenant.id, {
      parentBillId: bill.id,
      vendorId: customer.id,
      proxyNumber: 'DEMO-0001-P1',
      items: [{ description: 'Rice 25kg', quantity: 1, unitPrice: '130.00' }],
    });
    console.log(`  ✅ Proxy ${proxy.proxyNumber} for ${proxy.amountTotal}`);

    await core.credits.recordPayment(tenant.id, {
      vendorId: customer.id,
      proxyBillId: proxy.id,
      amount: '100.00',
      direction: 'INCOMING',
      method: 'CASH',
      date: today,
      idempotencyKey: 'demo-payment-1',
    });
    await core.delivery.createDeliveryOrder(tenant.id, {
      proxyBillId: proxy.id,
      deliveryUserId: 1,
      deliveryAddress: '12 Market Road',
      deliveryDate: today,
    });

    for (const row of await core.reports.outstandingReport(tenant.id)) {
      console.log(`  📊 ${row.vendorName}: outstanding ${row.outstanding}`);
    }
    console.log('\n✨ Demo seeding complete!');
  } finally {
    await core.close();
  }
}

seedDemo().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
