import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  MissingDeviceIdException,
  StorageException,
} from '../../../common/exceptions';
import { FlowMeterReadingRow, mapFlowFields } from '../../../models';
import { FlowMeterReadingRepository } from '../repositories/flow-meter-reading.repository';
import { FlowmeterService } from './flowmeter.service';

function storedRow(id: string, createdAt: string): FlowMeterReadingRow {
  return {
    id,
    deviceId: 'FM-7',
    createdAt: new Date(createdAt),
    ...mapFlowFields((key): string | null =>
      key === 'FT1MassFlow' ? '12.5000' : null,
    ),
  };
}

describe('FlowmeterService', () => {
  let service: FlowmeterService;

  const mockRepository = {
    insert: jest.fn(),
    count: jest.fn(),
    findPage: jest.fn(),
    findLatest: jest.fn(),
    summarizeByDevice: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FlowmeterService,
        { provide: FlowMeterReadingRepository, useValue: mockRepository },
      ],
    }).compile();

    service = module.get<FlowmeterService>(FlowmeterService);
  });

  describe('ingest', () => {
    it('should store a reading and acknowledge it', async () => {
      mockRepository.insert.mockResolvedValue({
        id: 'reading-1',
        createdAt: new Date('2026-10-19T08:15:00.000Z'),
      });

      const result = await service.ingest({
        deviceid: 'FM-7',
        FT1MassFlow: '$$12.5$$',
        FT1Temp: '$$',
      });

      expect(result).toEqual({
        success: true,
        message: 'Data received and stored successfully',
        id: 'reading-1',
        device_id: 'FM-7',
        timestamp: '2026-10-19T08:15:00.000Z',
      });
      expect(mockRepository.insert).toHaveBeenCalledWith({
        deviceId: 'FM-7',
        measurements: mapFlowFields((key) =>
          key === 'FT1MassFlow' ? 12.5 : null,
        ),
      });
    });

    it('should reject before touching the store', async () => {
      await expect(service.ingest({ FT1MassFlow: '1' })).rejects.toThrow(
        MissingDeviceIdException,
      );
      expect(mockRepository.insert).not.toHaveBeenCalled();
    });

    it('should hide storage failures behind a generic message', async () => {
      mockRepository.insert.mockRejectedValue(
        new Error('password authentication failed for user "postgres"'),
      );

      const attempt = service.ingest({ deviceid: 'FM-7' });

      await expect(attempt).rejects.toThrow(StorageException);
      await expect(attempt).rejects.toThrow('Internal server error');
    });
  });

  describe('query', () => {
    it('should return a page with totals', async () => {
      mockRepository.count.mockResolvedValue(3);
      mockRepository.findPage.mockResolvedValue([
        storedRow('reading-3', '2026-10-19T08:15:00.000Z'),
        storedRow('reading-2', '2026-10-19T08:10:00.000Z'),
      ]);

      const result = await service.query({
        deviceId: 'FM-7',
        page: 1,
        pageSize: 2,
      });

      expect(mockRepository.count).toHaveBeenCalledWith({ deviceId: 'FM-7' });
      expect(mockRepository.findPage).toHaveBeenCalledWith(
        { deviceId: 'FM-7' },
        { page: 1, pageSize: 2 },
      );
      expect(result.success).toBe(true);
      expect(result.totalCount).toBe(3);
      expect(result.totalPages).toBe(2);
      expect(result.data.map((record) => record.id)).toEqual([
        'reading-3',
        'reading-2',
      ]);
      expect(result.data[0].createdAt).toBe('2026-10-19T08:15:00.000Z');
      expect(result.data[0].FT1MassFlow).toBe(12.5);
    });

    it('should report zero pages for an empty result', async () => {
      mockRepository.count.mockResolvedValue(0);
      mockRepository.findPage.mockResolvedValue([]);

      const result = await service.query({ page: 1, pageSize: 100 });

      expect(result).toEqual({
        success: true,
        totalCount: 0,
        page: 1,
        pageSize: 100,
        totalPages: 0,
        data: [],
      });
    });

    it('should map read failures to a retrieval error', async () => {
      mockRepository.count.mockRejectedValue(new Error('timeout'));

      await expect(service.query({ page: 1, pageSize: 100 })).rejects.toThrow(
        'Error retrieving data',
      );
    });
  });

  describe('latest', () => {
    it('should return the newest reading', async () => {
      mockRepository.findLatest.mockResolvedValue(
        storedRow('reading-3', '2026-10-19T08:15:00.000Z'),
      );

      const result = await service.latest('FM-7');

      expect(mockRepository.findLatest).toHaveBeenCalledWith('FM-7');
      expect(result.data.id).toBe('reading-3');
    });

    it('should 404 when the device has no readings', async () => {
      mockRepository.findLatest.mockResolvedValue(null);

      const attempt = service.latest('FM-404');

      await expect(attempt).rejects.toThrow(NotFoundException);
      await expect(attempt).rejects.toThrow('No readings found for device FM-404');
    });

    it('should 404 when nothing is stored', async () => {
      mockRepository.findLatest.mockResolvedValue(null);
      await expect(service.latest()).rejects.toThrow('No readings found');
    });
  });

  describe('stats', () => {
    it('should total the per-device counts', async () => {
      mockRepository.summarizeByDevice.mockResolvedValue([
        {
          deviceId: 'FM-1',
          readingCount: 4,
          firstReadingAt: new Date('2026-10-18T00:00:00.000Z'),
          lastReadingAt: new Date('2026-10-19T00:00:00.000Z'),
        },
        {
          deviceId: 'FM-2',
          readingCount: 6,
          firstReadingAt: new Date('2026-10-17T00:00:00.000Z'),
          lastReadingAt: new Date('2026-10-19T06:00:00.000Z'),
        },
      ]);

      const result = await service.stats({});

      expect(result.totalReadings).toBe(10);
      expect(result.deviceCount).toBe(2);
      expect(result.devices[1]).toEqual({
        deviceId: 'FM-2',
        readingCount: 6,
        firstReadingAt: '2026-10-17T00:00:00.000Z',
        lastReadingAt: '2026-10-19T06:00:00.000Z',
      });
    });
  });
});
