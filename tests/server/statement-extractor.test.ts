import { describe, it, expect } from 'vitest';

import { extractReferences } from '../../src/server/validators/statement-extractor';
import { tokenize } from '../../src/server/lib/sql-tokenizer';
import { catalog } from '../fixtures/catalog';

function extract(sql: string) {
  const refs = extractReferences(sql, catalog);
  return {
    tables: [...refs.tables],
    columns: refs.columns.map(({ table, column }) => (table ? `${table}.${column}` : column)),
    unresolved: [...refs.unresolvedTables],
  };
}

describe('extractReferences', () => {
  describe('tables', () => {
    it('should record FROM and JOIN targets', () => {
      const refs = extract(
        'SELECT o.total FROM orders o JOIN customers c ON o.customer_id = c.id',
      );
      expect(refs.tables).toEqual(['orders', 'customers']);
      expect(refs.unresolved).toEqual([]);
    });

    it('should record every item of a comma-separated FROM list', () => {
      expect(extract('SELECT 1 FROM orders, invoices i, customers').tables).toEqual([
        'orders',
        'invoices',
        'customers',
      ]);
    });

    it('should accept tables qualified with the catalogue schema', () => {
      const refs = extract('SELECT total FROM public.orders');
      expect(refs.tables).toEqual(['orders']);
      expect(refs.columns).toEqual(['orders.total']);
    });

    it('should report relations outside the catalogue as unresolved', () => {
      expect(extract('SELECT * FROM pg_catalog.pg_tables').unresolved).toEqual([
        'pg_catalog.pg_tables',
      ]);
      expect(extract('SELECT salary FROM payroll').unresolved).toEqual(['payroll']);
      expect(extract('SELECT id FROM archive.orders').unresolved).toEqual(['archive.orders']);
    });

    it('should not treat FROM inside a function call as a table clause', () => {
      const refs = extract('SELECT EXTRACT(YEAR FROM order_date) FROM orders');
      expect(refs.tables).toEqual(['orders']);
      expect(refs.columns).toEqual(['orders.order_date']);
      expect(refs.unresolved).toEqual([]);
    });

    it('should find tables inside subqueries', () => {
      const refs = extract(
        'SELECT name FROM customers WHERE id IN (SELECT customer_id FROM orders)',
      );
      expect(refs.tables).toEqual(['customers', 'orders']);
    });

    it('should not report CTE names as tables', () => {
      const refs = extract(
        'WITH recent AS (SELECT id, total FROM orders) SELECT total FROM recent',
      );
      expect(refs.tables).toEqual(['orders']);
      expect(refs.unresolved).toEqual([]);
    });

    it('should find tables inside a parenthesised join', () => {
      const refs = extract(
        'SELECT o.id FROM (orders o JOIN customers c ON o.customer_id = c.id)',
      );
      expect(refs.tables).toEqual(['orders', 'customers']);
    });

    it('should find tables inside a subquery passed to a call', () => {
      expect(extract('SELECT ARRAY(SELECT c FROM customers c) AS names FROM orders').tables).toEqual([
        'customers',
        'orders',
      ]);
    });

    it('should treat TABLE as a relation', () => {
      expect(extract('WITH x AS (TABLE customers) SELECT x.* FROM orders, x').tables).toEqual([
        'customers',
        'orders',
      ]);
      expect(extract('SELECT id FROM orders WHERE id IN (TABLE employees)').tables).toEqual([
        'orders',
        'employees',
      ]);
    });

    it('should scope CTE names to the subquery that declares them', () => {
      const refs = extract(
        'SELECT * FROM (WITH customers AS (SELECT 1 AS v) SELECT v FROM customers) s, customers',
      );
      expect(refs.tables).toEqual(['customers']);
      expect(refs.unresolved).toEqual([]);
    });

    it('should read a table inside a non-recursive CTE of the same name', () => {
      expect(
        extract('WITH customers AS (SELECT * FROM customers) SELECT name FROM customers').tables,
      ).toEqual(['customers']);
    });

    it('should let a recursive CTE refer to itself', () => {
      const refs = extract(
        'WITH RECURSIVE chain AS (SELECT id FROM orders UNION ALL SELECT c.id FROM chain c) SELECT id FROM chain',
      );
      expect(refs.tables).toEqual(['orders']);
      expect(refs.unresolved).toEqual([]);
    });

    it('should accept a column list after a CTE name', () => {
      const refs = extract(
        'WITH totals (order_id, amount) AS (SELECT id, total FROM orders) SELECT amount FROM totals',
      );
      expect(refs.tables).toEqual(['orders']);
      expect(refs.unresolved).toEqual([]);
    });
  });

  describe('columns', () => {
    it('should attribute unqualified columns to the only table', () => {
      expect(extract('SELECT id, total FROM orders').columns).toEqual(['orders.id', 'orders.total']);
    });

    it('should resolve aliases to their tables', () => {
      expect(
        extract('SELECT o.total, c.name FROM orders o JOIN customers c ON o.customer_id = c.id')
          .columns,
      ).toEqual(['orders.total', 'customers.name', 'orders.customer_id', 'customers.id']);
    });

    it('should resolve AS aliases', () => {
      expect(extract('SELECT x.total FROM orders AS x').columns).toEqual(['orders.total']);
    });

    it('should keep unqualified columns unqualified when several tables are in scope', () => {
      expect(extract('SELECT total FROM orders, invoices').columns).toEqual(['total']);
    });

    it('should skip function names but scan their arguments', () => {
      const refs = extract('SELECT COUNT(*), SUM(o.total) FROM orders o');
      expect(refs.columns).toEqual(['orders.total']);
    });

    it('should skip output aliases and cast targets', () => {
      expect(extract('SELECT total AS amount, id::text FROM orders').columns).toEqual([
        'orders.total',
        'orders.id',
      ]);
    });

    it('should drop identifiers that are not catalogue columns', () => {
      expect(extract("SELECT id FROM orders WHERE order_date > now() - interval '1 day'").columns)
        .toEqual(['orders.id', 'orders.order_date']);
    });

    it('should resolve a shadowed qualifier against every table it may name', () => {
      expect(
        extract('SELECT (SELECT customers.phone FROM customers) AS p, customers.id FROM orders customers')
          .columns,
      ).toEqual(['customers.phone', 'orders.id', 'customers.id']);
    });

    it('should drop qualified columns the table does not have', () => {
      expect(extract('SELECT o.name FROM orders o').columns).toEqual([]);
    });

    it('should scan WHERE, GROUP BY and ORDER BY clauses', () => {
      expect(
        extract('SELECT customer_id, SUM(total) FROM orders WHERE employee_id = 3 GROUP BY customer_id ORDER BY 2')
          .columns,
      ).toEqual(['orders.customer_id', 'orders.total', 'orders.employee_id']);
    });

    it('should fall back to unqualified columns for CTE sources', () => {
      expect(
        extract('WITH recent AS (SELECT id, total FROM orders) SELECT total FROM recent').columns,
      ).toEqual(['id', 'total']);
    });

    it('should read quoted identifiers with their exact spelling', () => {
      expect(extract('SELECT "total" FROM "orders"').columns).toEqual(['orders.total']);
      expect(extract('SELECT "Total" FROM orders').columns).toEqual([]);
    });
  });

  describe('wildcards', () => {
    it('should expand * to every column of every table', () => {
      expect(extract('SELECT * FROM customers').columns).toEqual([
        'customers.id',
        'customers.name',
        'customers.phone',
        'customers.country',
      ]);
    });

    it('should expand t.* to the columns of that table', () => {
      expect(extract('SELECT c.* FROM customers c JOIN orders o ON o.customer_id = c.id').columns)
        .toEqual([
          'customers.id',
          'customers.name',
          'customers.phone',
          'customers.country',
          'orders.customer_id',
        ]);
    });

    it('should treat a whole-row reference as every column of the table', () => {
      expect(extract('SELECT o FROM orders o').columns).toEqual([
        'orders.id',
        'orders.customer_id',
        'orders.employee_id',
        'orders.total',
        'orders.order_date',
      ]);
    });

    it('should not expand COUNT(*)', () => {
      expect(extract('SELECT COUNT(*) FROM employees').columns).toEqual([]);
    });
  });

  it('should accept pre-tokenized input', () => {
    const refs = extractReferences(tokenize('SELECT total FROM orders'), catalog);
    expect(refs.columns).toEqual([{ table: 'orders', column: 'total' }]);
  });

  it('should not throw on malformed input', () => {
    expect(() => extract('SELECT (( FROM , ) orders WHERE')).not.toThrow();
    expect(extract('').tables).toEqual([]);
  });
});
