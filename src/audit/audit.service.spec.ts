import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AuditService } from './audit.service';
import { AuditEventRepository } from './domain/repositories/audit-event.repository.port';
import { AuditEventKind } from './domain/enums/audit-event-kind.enum';
import { AuditEntityType } from './domain/enums/audit-entity-type.enum';
import { AuditEvent } from './domain/entities/audit-event.entity';
import { InMemoryAuditEventRepository } from '../../test/utils/fakes/in-memory-audit-event.repository';
import { buildTestConfigService } from '../../test/utils/test-config';

describe('AuditService', () => {
  let service: AuditService;
  let repository: InMemoryAuditEventRepository;

  const documentRef = {
    entityType: AuditEntityType.DOCUMENT,
    entityId: 'doc-1',
  };

  beforeEach(async () => {
    repository = new InMemoryAuditEventRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuditService,
        { provide: AuditEventRepository, useValue: repository },
        { provide: ConfigService, useValue: buildTestConfigService() },
      ],
    }).compile();

    service = module.get<AuditService>(AuditService);
  });

  describe('append', () => {
    it('should store events with increasing ids', async () => {
      const first = await service.append({
        ...documentRef,
        kind: AuditEventKind.UPLOAD,
        actorSubject: 'author-1',
        payload: { contentRef: 'documents/ab/abc' },
      });
      const second = await service.append({
        ...documentRef,
        kind: AuditEventKind.MOVE,
        actorSubject: 'author-1',
        payload: {},
      });

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(repository.kinds()).toEqual(['upload', 'move']);
    });

    it('should retry a failed append until it is stored', async () => {
      repository.failNextAppends(2);

      const event = await service.append({
        ...documentRef,
        kind: AuditEventKind.ARCHIVE,
        actorSubject: 'author-1',
        payload: {},
      });

      expect(event.id).toBe(1);
      expect(repository.events).toHaveLength(1);
    });

    it('should re-throw when storage keeps failing', async () => {
      repository.failNextAppends(3);

      await expect(
        service.append({
          ...documentRef,
          kind: AuditEventKind.ARCHIVE,
          actorSubject: 'author-1',
          payload: {},
        }),
      ).rejects.toThrow('audit store unavailable');
      expect(repository.events).toHaveLength(0);
    });
  });

  describe('history', () => {
    async function collect(
      iterable: AsyncIterable<AuditEvent>,
    ): Promise<number[]> {
      const ids: number[] = [];
      for await (const event of iterable) {
        ids.push(event.id);
      }
      return ids;
    }

    beforeEach(async () => {
      for (let i = 0; i < 250; i++) {
        await repository.append({
          entityType: AuditEntityType.DOCUMENT,
          entityId: i % 2 === 0 ? 'doc-1' : 'doc-2',
          kind: AuditEventKind.VALIDATE_START,
          actorSubject: 'system',
          payload: { seq: i },
        });
      }
    });

    it('should yield only the events of the entity, in id order', async () => {
      const ids = await collect(service.history(documentRef));

      expect(ids).toHaveLength(125);
      expect(ids[0]).toBe(1);
      expect(ids[124]).toBe(249);
      expect(ids.every((id, index) => index === 0 || id > ids[index - 1])).toBe(
        true,
      );
    });

    it('should resume after a given id', async () => {
      const ids = await collect(service.history(documentRef, 245));

      expect(ids).toEqual([247, 249]);
    });

    it('should not read storage until iterated', async () => {
      const findAfter = jest.spyOn(repository, 'findAfter');

      const iterator = service.history(documentRef);
      expect(findAfter).not.toHaveBeenCalled();

      const first = await iterator.next();
      expect(first.value).toMatchObject({ id: 1 });
      expect(findAfter).toHaveBeenCalledTimes(1);
    });
  });
});
