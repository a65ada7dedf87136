import { Test, TestingModule } from '@nestjs/testing';
import { InternalServerErrorException } from '@nestjs/common';
import { DATABASE_CONNECTION } from '../database/database.constants';
import { LogsService } from './logs.service';

describe('LogsService', () => {
  let logsService: LogsService;
  const mockDb = {
    insert: jest.fn(),
    partitionedFind: jest.fn(),
  };

  beforeEach(async () => {
    mockDb.insert.mockReset();
    mockDb.partitionedFind.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [LogsService, { provide: DATABASE_CONNECTION, useValue: mockDb }],
    }).compile();

    logsService = module.get<LogsService>(LogsService);
  });

  it('record should insert a log document in the session partition', async () => {
    mockDb.insert.mockResolvedValue({ id: 'session-1:log:abc', rev: '1-0' });

    const res = await logsService.record(
      'session-1',
      { userId: 'u:1', name: 'Chef' },
      'stock.consume',
      'stock',
      'tomato',
      { requested: 4 },
    );

    expect(mockDb.insert).toHaveBeenCalledTimes(1);
    const inserted = mockDb.insert.mock.calls[0][0];
    expect(inserted._id).toMatch(/^session-1:log:/);
    expect(inserted).toMatchObject({
      type: 'log',
      sessionId: 'session-1',
      action: 'stock.consume',
      resource: 'stock',
      resourceId: 'tomato',
      actor: { userId: 'u:1', name: 'Chef', role: null },
      meta: { requested: 4 },
    });
    expect(typeof inserted.createdAt).toBe('string');

    expect(res).toEqual({ id: 'session-1:log:abc', rev: '1-0' });
  });

  it('record should default the optional fields to null', async () => {
    mockDb.insert.mockResolvedValue({ id: 'session-1:log:def', rev: '1-0' });

    await logsService.record('session-1', { userId: 'u:2' }, 'stock.session_close', 'stock');

    expect(mockDb.insert.mock.calls[0][0]).toMatchObject({
      resourceId: null,
      meta: null,
      actor: { userId: 'u:2', name: null, role: null },
    });
  });

  it('record should throw InternalServerErrorException when insert fails', async () => {
    mockDb.insert.mockRejectedValue(new Error('db down'));

    await expect(
      logsService.record('session-1', { userId: 'u:2' }, 'lot.add', 'lot'),
    ).rejects.toThrow(InternalServerErrorException);
  });

  it('findAll should query the session partition with the given filters', async () => {
    const docs = [{ _id: 'session-1:log:1' }, { _id: 'session-1:log:2' }];
    mockDb.partitionedFind.mockResolvedValue({ docs });

    const result = await logsService.findAll('session-1', {
      action: 'lot.add',
      resource: 'lot',
      userId: 'u:1',
      limit: 10,
      skip: 0,
    });

    expect(mockDb.partitionedFind).toHaveBeenCalledWith('session-1', {
      selector: {
        type: 'log',
        action: 'lot.add',
        resource: 'lot',
        'actor.userId': 'u:1',
      },
      limit: 10,
      skip: 0,
    });
    expect(result).toEqual(docs);
  });

  it('findAll should throw InternalServerErrorException on db error', async () => {
    mockDb.partitionedFind.mockRejectedValue(new Error('db error'));
    await expect(logsService.findAll('session-1')).rejects.toThrow(
      InternalServerErrorException,
    );
  });
});
