import { missingDatabaseTransactions } from '../src/analyzers/best-practices/missing-database-transactions';
import { analyzeSource } from './helpers';

function service(body: string): string {
  return `<?php
namespace App\\Services;

use App\\Models\\Order;
use Illuminate\\Support\\Facades\\DB;

class OrderService
{
    public function run(array $data)
    {
${body}
    }
}
`;
}

describe('missing-database-transactions', () => {
  it('should flag a method with two unprotected writes', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        $order = Order::create($data);
        $order->update(['status' => 'placed']);`),
    );

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('missing-transaction');
    expect(issues[0].severity).toBe('medium');
    expect(issues[0].message).toBe('Method "OrderService::run()" has 2 write operations without transaction protection');
    expect(issues[0].metadata).toEqual({
      class: 'App\\Services\\OrderService',
      method: 'run',
      write_count: 2,
      write_lines: [11, 12],
      threshold: 2,
    });
  });

  it('should accept a single write', () => {
    expect(analyzeSource(missingDatabaseTransactions, service('        Order::create($data);'))).toEqual([]);
  });

  it('should accept writes inside a transaction closure', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        DB::transaction(function () use ($data) {
            $order = Order::create($data);
            $order->update(['status' => 'placed']);
        });`),
    );
    expect(issues).toEqual([]);
  });

  it('should still flag writes that precede an empty transaction', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        $order = Order::create($data);
        $order->update(['status' => 'placed']);
        DB::transaction(function () {
        });`),
    );
    expect(issues.map((issue) => issue.metadata.write_count)).toEqual([2]);
  });

  it('should accept writes between beginTransaction() and commit()', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        DB::beginTransaction();
        $order = Order::create($data);
        $order->update(['status' => 'placed']);
        DB::commit();`),
    );
    expect(issues).toEqual([]);
  });

  it('should end a manual transaction on DB::rollback()', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        DB::beginTransaction();
        Order::create($data);
        DB::rollback();
        Order::create($data);
        Order::create($data);`),
    );
    expect(issues.map((issue) => issue.metadata.write_lines)).toEqual([[14, 15]]);
  });

  it('should not protect a closure defined next to a transaction but not passed to it', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        $callback = function () use ($data) {
            $order = Order::create($data);
            $order->update(['status' => 'placed']);
        };
        DB::transaction(function () {
        });`),
    );
    expect(issues.map((issue) => issue.metadata.write_lines)).toEqual([[12, 13]]);
  });

  it('should not count push() on a collection', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        $items = collect();
        $items->push(1);
        $items->push(2);`),
    );
    expect(issues).toEqual([]);
  });

  it('should count push() on a model', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        $order = Order::where('id', $data['id'])->first();
        $order->push();
        $order->push();`),
    );
    expect(issues.map((issue) => issue.metadata.write_lines)).toEqual([[12, 13]]);
  });

  it('should not count cache and session writes', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        Cache::increment('orders');
        cache()->increment('orders.today');
        session()->push('recent', $data);`),
    );
    expect(issues).toEqual([]);
  });

  it('should skip seeders', () => {
    const issues = analyzeSource(
      missingDatabaseTransactions,
      service(`        Order::create($data);
        Order::create($data);`),
      { file: 'database/seeders/OrderSeeder.php' },
    );
    expect(issues).toEqual([]);
  });

  it('should honor the threshold and whitelist options', () => {
    const body = `        Order::create($data);
        Order::create($data);`;
    expect(analyzeSource(missingDatabaseTransactions, service(body), { options: { threshold: 3 } })).toEqual([]);
    expect(
      analyzeSource(missingDatabaseTransactions, service(body), { options: { whitelist: ['OrderService::run'] } }),
    ).toEqual([]);
  });
});
