import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { testingInfrastructure } from '../testing/test-database';
import { AuditLogService } from './audit-log.service';
import { AuditModule } from './audit.module';

describe('AuditLogService', () => {
  let moduleRef: TestingModule;
  let audit: AuditLogService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [...testingInfrastructure(), AuditModule],
    }).compile();
    audit = moduleRef.get(AuditLogService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('stores the entry with its changes', async () => {
    const entry = await audit.record({
      actorId: 'admin-1',
      action: 'update',
      entityType: 'product',
      entityId: 'p-1',
      changes: { price: { from: 10, to: 12.5 } },
    });

    const [stored] = await audit.findAll({ entityId: 'p-1' });
    expect(stored).toMatchObject({
      id: entry.id,
      actorId: 'admin-1',
      action: 'update',
      entityType: 'product',
      changes: { price: { from: 10, to: 12.5 } },
    });
    expect(stored.createdAt).toBeInstanceOf(Date);
  });

  it('records system changes without an actor', async () => {
    const entry = await audit.record({
      action: 'status_change',
      entityType: 'order',
      entityId: 'o-1',
    });

    expect(entry.actorId).toBeNull();
    expect(entry.changes).toBeNull();
  });

  it('filters by entity type and actor', async () => {
    await audit.record({ actorId: 'admin-1', action: 'create', entityType: 'coupon', entityId: 'c-1' });
    await audit.record({ actorId: 'admin-2', action: 'create', entityType: 'coupon', entityId: 'c-2' });
    await audit.record({ actorId: 'admin-1', action: 'delete', entityType: 'user', entityId: 'u-1' });

    const coupons = await audit.findAll({ entityType: 'coupon', actorId: 'admin-1' });

    expect(coupons.map((entry) => entry.entityId)).toEqual(['c-1']);
    expect(await audit.findAll()).toHaveLength(3);
  });

  it('rolls back with the surrounding transaction', async () => {
    const dataSource = moduleRef.get(DataSource);

    await expect(
      dataSource.transaction(async (manager) => {
        await audit.record(
          { action: 'create', entityType: 'user', entityId: 'u-9' },
          manager,
        );
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(await audit.findAll({ entityId: 'u-9' })).toEqual([]);
  });
});
