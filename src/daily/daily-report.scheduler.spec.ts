import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';

import { DailyReportScheduler } from './daily-report.scheduler';
import { DailyService } from './daily.service';

describe('DailyReportScheduler', () => {
  const mockDailyService = {
    postAllDailyReports: jest.fn().mockResolvedValue(2),
  };

  const createScheduler = async (scheduled: boolean): Promise<DailyReportScheduler> => {
    const module = await Test.createTestingModule({
      providers: [
        DailyReportScheduler,
        { provide: DailyService, useValue: mockDailyService },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue: unknown) =>
              key === 'daily.scheduled' ? scheduled : defaultValue,
            ),
          },
        },
      ],
    }).compile();

    return module.get(DailyReportScheduler);
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should post all dailies when enabled', async () => {
    const scheduler = await createScheduler(true);

    await scheduler.postDailyReports();

    expect(mockDailyService.postAllDailyReports).toHaveBeenCalledTimes(1);
  });

  it('should do nothing when disabled', async () => {
    const scheduler = await createScheduler(false);

    await scheduler.postDailyReports();

    expect(mockDailyService.postAllDailyReports).not.toHaveBeenCalled();
  });

  it('should survive a failed run', async () => {
    mockDailyService.postAllDailyReports.mockRejectedValueOnce(new Error('tracker down'));
    const scheduler = await createScheduler(true);

    await expect(scheduler.postDailyReports()).resolves.toBeUndefined();
  });
});
