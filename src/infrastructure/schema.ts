import type { Knex } from 'knex';
import type { Db } from './db.js';

type InlineMigration = { name: string; up: (knex: Knex) => Promise<void>; down: (knex: Knex) => Promise<void> };

const STATUS = ['DRAFT', 'CONFIRMED', 'CANCELLED'];

async function createInitialSchema(knex: Knex): Promise<void> {
  await knex.schema.createTable('tenants', (t) => {
    t.increments('id').primary();
    t.string('name', 200).notNullable();
    t.string('code', 50).notNullable().unique();
    t.boolean('active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable();
  });

  await knex.schema.createTable('vendors', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.string('name', 200).notNullable();
    t.enu('type', ['SUPPLIER', 'CUSTOMER', 'BOTH']).notNullable();
    t.decimal('credit_limit', 12, 2).notNullable().defaultTo(0);
    t.string('contact_phone', 20);
    t.string('email', 100);
    t.text('address');
    t.string('gst_number', 50);
    t.timestamp('created_at', { useTz: true }).notNullable();
    // Target of the composite (tenant_id, vendor_id) foreign keys below. Those keep the default
    // NO ACTION: a vendor with bills cannot be deleted, yet a tenant cascade can still remove both
    // in one statement (RESTRICT would fail mid-cascade on postgres).
    t.unique(['tenant_id', 'id']);
    t.index(['tenant_id']);
  });

  await knex.schema.createTable('bills', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.integer('vendor_id').notNullable();
    t.string('bill_number', 100).notNullable();
    t.date('bill_date').notNullable();
    t.enu('bill_type', ['NORMAL', 'HANDBILL']).notNullable();
    t.enu('status', STATUS).notNullable().defaultTo('DRAFT');
    t.decimal('amount_subtotal', 12, 2).notNullable().defaultTo(0);
    t.decimal('amount_tax', 12, 2).notNullable().defaultTo(0);
    t.decimal('amount_total', 12, 2).notNullable().defaultTo(0);
    t.boolean('is_authorized').notNullable().defaultTo(false);
    t.integer('authorized_by');
    t.timestamp('authorized_at', { useTz: true });
    t.integer('version').notNullable().defaultTo(1);
    t.text('ocr_text');
    t.string('image_path', 500);
    t.date('delivery_date');
    t.string('billed_to_name', 200);
    t.string('shipped_to_name', 200);
    t.string('delivery_recipient', 200);
    t.string('post', 100);
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.foreign(['tenant_id', 'vendor_id']).references(['tenant_id', 'id']).inTable('vendors');
    t.index(['tenant_id', 'vendor_id']);
    t.index(['tenant_id', 'bill_date']);
    t.index(['tenant_id', 'status']);
  });

  await knex.schema.createTable('bill_items', (t) => {
    t.increments('id').primary();
    t.integer('bill_id').notNullable().references('id').inTable('bills').onDelete('CASCADE');
    t.integer('position').notNullable();
    t.string('description', 500).notNullable();
    t.decimal('quantity', 10, 2).notNullable();
    t.decimal('unit_price', 12, 2).notNullable();
    t.decimal('amount', 12, 2).notNullable();
    t.index(['bill_id']);
  });

  await knex.schema.createTable('proxy_bills', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.integer('parent_bill_id').notNullable().references('id').inTable('bills');
    t.integer('vendor_id').notNullable();
    t.string('proxy_number', 100).notNullable();
    t.enu('status', STATUS).notNullable().defaultTo('CONFIRMED');
    t.decimal('amount_total', 12, 2).notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.foreign(['tenant_id', 'vendor_id']).references(['tenant_id', 'id']).inTable('vendors');
    t.index(['tenant_id', 'parent_bill_id']);
    t.index(['tenant_id', 'vendor_id']);
  });

  await knex.schema.createTable('proxy_bill_items', (t) => {
    t.increments('id').primary();
    t.integer('proxy_bill_id').notNullable().references('id').inTable('proxy_bills').onDelete('CASCADE');
    t.integer('position').notNullable();
    t.string('description', 500).notNullable();
    t.decimal('quantity', 10, 2).notNullable();
    t.decimal('unit_price', 12, 2).notNullable();
    t.decimal('amount', 12, 2).notNullable();
    t.index(['proxy_bill_id']);
  });

  await knex.schema.createTable('credit_entries', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.integer('vendor_id').notNullable();
    t.integer('bill_id').references('id').inTable('bills').onDelete('SET NULL');
    t.integer('proxy_bill_id').references('id').inTable('proxy_bills').onDelete('SET NULL');
    t.decimal('amount', 12, 2).notNullable();
    t.enu('direction', ['INCOMING', 'OUTGOING']).notNullable();
    t.enu('payment_method', ['CASH', 'UPI', 'BANK', 'CHEQUE', 'CARD']).notNullable();
    t.date('payment_date').notNullable();
    t.string('reference_number', 100);
    t.text('notes');
    t.string('idempotency_key', 100);
    t.integer('created_by');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.foreign(['tenant_id', 'vendor_id']).references(['tenant_id', 'id']).inTable('vendors');
    t.unique(['tenant_id', 'idempotency_key']);
    t.index(['tenant_id', 'vendor_id', 'payment_date']);
    t.index(['bill_id']);
    t.index(['proxy_bill_id']);
  });

  await knex.schema.createTable('delivery_orders', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.integer('bill_id').references('id').inTable('bills').onDelete('SET NULL');
    t.integer('proxy_bill_id').references('id').inTable('proxy_bills').onDelete('SET NULL');
    t.integer('delivery_user_id').notNullable();
    t.text('delivery_address').notNullable();
    t.date('delivery_date').notNullable();
    t.enu('status', ['PENDING', 'IN_TRANSIT', 'DELIVERED', 'CANCELLED']).notNullable().defaultTo('PENDING');
    t.text('remarks');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['tenant_id', 'status']);
  });

  await knex.schema.createTable('audit_logs', (t) => {
    t.increments('id').primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.integer('user_id');
    t.string('action', 100).notNullable();
    t.string('entity_type', 50).notNullable();
    t.string('entity_id', 50);
    t.text('metadata');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['tenant_id', 'entity_type', 'entity_id']);
  });

  await knex.schema.createTable('outbox_events', (t) => {
    t.string('event_id', 36).primary();
    t.integer('tenant_id').notNullable().references('id').inTable('tenants').onDelete('CASCADE');
    t.string('event_type', 100).notNullable();
    t.string('aggregate_type', 50).notNullable();
    t.string('aggregate_id', 50).notNullable();
    t.text('payload').notNullable();
    t.timestamp('occurred_at', { useTz: true }).notNullable();
    t.timestamp('published_at', { useTz: true });
    t.index(['tenant_id', 'published_at']);
  });
}

async function dropInitialSchema(knex: Knex): Promise<void> {
  for (const table of [
    'outbox_events',
    'audit_logs',
    'delivery_orders',
    'credit_entries',
    'proxy_bill_items',
    'proxy_bills',
    'bill_items',
    'bills',
    'vendors',
    'tenants',
  ]) {
    await knex.schema.dropTableIfExists(table);
  }
}

const MIGRATIONS: InlineMigration[] = [
  { name: '001_initial_schema', up: createInitialSchema, down: dropInitialSchema },
];

/** Serves the migrations above to knex's migrator, so no migration files ship beside the build. */
class InlineMigrationSource implements Knex.MigrationSource<InlineMigration> {
  async getMigrations(): Promise<InlineMigration[]> {
    return MIGRATIONS;
  }

  getMigrationName(migration: InlineMigration): string {
    return migration.name;
  }

  async getMigration(migration: InlineMigration): Promise<Knex.Migration> {
    return { up: migration.up, down: migration.down };
  }
}

/** Applies pending migrations and returns the names applied by this call. */
export async function migrateToLatest(db: Db): Promise<string[]> {
  // knex resolves [batchNo, names].
  const result: unknown = await db.knex.migrate.latest({ migrationSource: new InlineMigrationSource() });
  const applied: unknown = Array.isArray(result) ? result[1] : undefined;
  if (!Array.isArray(applied)) return [];
  return applied.filter((name: unknown): name is string => typeof name === 'string');
}

export async function rollbackAll(db: Db): Promise<void> {
  await db.knex.migrate.rollback({ migrationSource: new InlineMigrationSource() }, true);
}
