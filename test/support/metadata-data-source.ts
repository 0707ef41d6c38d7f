import { DataSource } from 'typeorm';
import type { ObjectLiteral, Repository, SelectQueryBuilder } from 'typeorm';
import { BLOG_ENTITIES } from '../../src/modules/database/entities';

/**
 * A Postgres DataSource that builds entity metadata but never connects,
 * so query builders can render their SQL in-process.
 */
class OfflineDataSource extends DataSource {
  async loadMetadata(): Promise<this> {
    await this.buildMetadatas();
    return this;
  }
}

export function offlinePostgresDataSource(): Promise<DataSource> {
  return new OfflineDataSource({
    type: 'postgres',
    url: 'postgres://test@localhost:5432/test',
    entities: BLOG_ENTITIES,
  }).loadMetadata();
}

/**
 * Records every query builder the repository creates and stubs out execution,
 * leaving the built query to be inspected.
 */
export function captureQueryBuilders<T extends ObjectLiteral>(repo: Repository<T>): SelectQueryBuilder<T>[] {
  const built: SelectQueryBuilder<T>[] = [];
  const create = repo.createQueryBuilder.bind(repo);
  jest.spyOn(repo, 'createQueryBuilder').mockImplementation((alias, queryRunner) => {
    const qb = create(alias, queryRunner);
    jest.spyOn(qb, 'getMany').mockResolvedValue([]);
    jest.spyOn(qb, 'getCount').mockResolvedValue(0);
    built.push(qb);
    return qb;
  });
  return built;
}
