import { DdlParserService } from './ddl-parser.service';

describe('DdlParserService', () => {
  const parser = new DdlParserService();

  describe('splitStatements', () => {
    it('splits on semicolons, trims and drops empty fragments', () => {
      expect(parser.splitStatements('  a ;; b;  \n')).toEqual(['a', 'b']);
    });

    it('returns nothing for blank input', () => {
      expect(parser.splitStatements(' ; ;')).toEqual([]);
    });
  });

  describe('parseStatement', () => {
    it('reads an inline foreign key', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE orders (id INT, user_id INT REFERENCES users(id))',
      );

      expect(statement).toEqual({
        tableName: 'orders',
        rawText: 'CREATE TABLE orders (id INT, user_id INT REFERENCES users(id));',
        dependsOn: new Set(['users']),
      });
    });

    it('reads a table-level multi-column foreign key', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE line_items (order_id INT, product_id INT, ' +
          'FOREIGN KEY (order_id, product_id) REFERENCES order_products (order_id, product_id))',
      );

      expect(statement?.tableName).toBe('line_items');
      expect([...(statement?.dependsOn ?? [])]).toEqual(['order_products']);
    });

    it('accepts quoted table and referenced names', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE `comments` (post_id INT REFERENCES "posts" (id), author_id INT REFERENCES `users`(id))',
      );

      expect(statement?.tableName).toBe('comments');
      expect([...(statement?.dependsOn ?? [])]).toEqual(['posts', 'users']);
    });

    it('collapses repeated references', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE transfers (from_id INT REFERENCES accounts(id), to_id INT REFERENCES accounts(id))',
      );

      expect(statement?.dependsOn.size).toBe(1);
      expect(statement?.dependsOn.has('accounts')).toBe(true);
    });

    it('keeps a self reference', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE employees (id INT PRIMARY KEY, manager_id INT REFERENCES employees(id))',
      );

      expect([...(statement?.dependsOn ?? [])]).toEqual(['employees']);
    });

    it('uses the last segment of a qualified reference', () => {
      const statement = parser.parseStatement(
        'CREATE TABLE sessions (user_id INT REFERENCES public.users(id))',
      );

      expect([...(statement?.dependsOn ?? [])]).toEqual(['users']);
    });

    it('matches keywords in any case', () => {
      const statement = parser.parseStatement('create table t (id int references u(id))');

      expect(statement?.tableName).toBe('t');
      expect([...(statement?.dependsOn ?? [])]).toEqual(['u']);
    });

    it('finds the header after leading text', () => {
      const statement = parser.parseStatement('-- accounts\nCREATE TABLE accounts (id INT)');

      expect(statement?.tableName).toBe('accounts');
      expect(statement?.rawText).toBe('-- accounts\nCREATE TABLE accounts (id INT);');
    });

    it('finds the header after a comment containing an apostrophe', () => {
      const statement = parser.parseStatement(
        "-- each customer's orders\nCREATE TABLE orders (id INT, customer_id INT REFERENCES customers(id))",
      );

      expect(statement?.tableName).toBe('orders');
      expect([...(statement?.dependsOn ?? [])]).toEqual(['customers']);
    });

    it('reads references after an inline comment containing an apostrophe', () => {
      const statement = parser.parseStatement(
        "CREATE TABLE orders (\n  id INT, -- the customer's order\n  customer_id INT REFERENCES customers(id)\n)",
      );

      expect([...(statement?.dependsOn ?? [])]).toEqual(['customers']);
    });

    it('ignores REFERENCES inside a block comment', () => {
      const statement = parser.parseStatement(
        "CREATE TABLE notes (/* don't add REFERENCES users yet */ id INT, post_id INT REFERENCES posts(id))",
      );

      expect([...(statement?.dependsOn ?? [])]).toEqual(['posts']);
    });

    it('ignores REFERENCES inside string literals', () => {
      const statement = parser.parseStatement(
        "CREATE TABLE notes (body TEXT DEFAULT 'REFERENCES users')",
      );

      expect(statement?.dependsOn.size).toBe(0);
    });

    it.each([
      ['CREATE INDEX idx_orders_user ON orders (user_id)'],
      ['CREATE TABLE IF NOT EXISTS t (id INT)'],
      ['CREATE TABLE public.t (id INT)'],
      ['CREATE TABLE "two words" (id INT)'],
      ['CREATE TABLE t AS SELECT 1'],
      ['INSERT INTO t VALUES (1)'],
    ])('returns undefined without a recognised header: %s', (fragment) => {
      expect(parser.parseStatement(fragment)).toBeUndefined();
    });
  });

  describe('parseBatch', () => {
    it('separates table statements from other fragments', () => {
      const batch = parser.parseBatch(
        'CREATE TABLE a (id INT); CREATE INDEX idx_a ON a (id); CREATE TABLE b (a_id INT REFERENCES a(id));',
      );

      expect(batch.statements.map((s) => s.tableName)).toEqual(['a', 'b']);
      expect(batch.unparsed).toEqual(['CREATE INDEX idx_a ON a (id)']);
    });

    it('keeps the first position and the last definition of a repeated table', () => {
      const batch = parser.parseBatch(
        'CREATE TABLE a (id INT); CREATE TABLE b (id INT); CREATE TABLE a (id BIGINT);',
      );

      expect(batch.statements.map((s) => s.rawText)).toEqual([
        'CREATE TABLE a (id BIGINT);',
        'CREATE TABLE b (id INT);',
      ]);
    });
  });
});
