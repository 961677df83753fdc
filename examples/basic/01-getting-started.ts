/**
 * Getting Started with sqlweave
 *
 * Builds the same SELECT for MariaDB and Oracle and prints both.
 */

import sqlweave, { Dialect, createConsoleLogger, QueryBuildError } from 'sqlweave';

import type { QueryBuilder } from 'sqlweave';

function buildUserReport(builder: QueryBuilder): string {
  return builder
    .select(['id', 'name', 'DATE'])
    .distinct()
    .from('users')
    .useIndex('idx_users_name')
    .whereWithPlaceholder([['join_date', '?joindate']])
    .setValue('?joindate', 'SYSDATE')
    .innerJoin('orders', 'users.id = orders.user_id')
    .orderBy('name')
    .limit(10)
    .offset(5)
    .render();
}

function dialectExample() {
  console.log('\n=== Dialects ===');

  for (const dialect of [Dialect.MariaDB, Dialect.Oracle]) {
    console.log(`${dialect}:`, buildUserReport(sqlweave(dialect)));
  }
}

function dateExample() {
  console.log('\n=== Date literals ===');

  const sql = sqlweave('oracle')
    .select(['event_id'])
    .from('events')
    .where([['event_time', '2024-01-01 10:00:00']], true)
    .render();
  console.log(sql);
}

function strictExample() {
  console.log('\n=== Strict mode ===');

  const builder = sqlweave(Dialect.MariaDB, { strict: true, logger: createConsoleLogger() })
    .from('users')
    .whereWithPlaceholder([['id', ':id']]);

  try {
    builder.render();
  } catch (error) {
    if (error instanceof QueryBuildError) {
      console.log(`Rejected (${error.code}): ${error.message}`);
    } else {
      throw error;
    }
  }

  console.log(builder.setValue(':id', 42).render());
}

function main() {
  console.log('🚀 sqlweave Getting Started');
  dialectExample();
  dateExample();
  strictExample();
}

main();
