import { DataSource } from 'typeorm';
import { AllEntities } from '../src/entities';

/**
 * In-memory SQLite database with the full schema, one per test.
 * Foreign keys and unique constraints are enforced as in production.
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: AllEntities,
    synchronize: true,
    dropSchema: true,
  });
  return dataSource.initialize();
}
