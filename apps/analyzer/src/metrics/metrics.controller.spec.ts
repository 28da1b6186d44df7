import { Test, TestingModule } from '@nestjs/testing';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

describe('MetricsController', () => {
  let controller: MetricsController;
  let metricsService: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MetricsController],
      providers: [
        {
          provide: MetricsService,
          useValue: {
            getMetrics: jest
              .fn()
              .mockResolvedValue('# HELP analyzer_analyses_total x\nanalyzer_analyses_total 0'),
          },
        },
      ],
    }).compile();

    controller = module.get<MetricsController>(MetricsController);
    metricsService = module.get<MetricsService>(MetricsService);
  });

  it('should return Prometheus metrics from MetricsService', async () => {
    const result = await controller.getMetrics();
    expect(result).toContain('analyzer_analyses_total 0');
    expect(metricsService.getMetrics).toHaveBeenCalled();
  });
});
