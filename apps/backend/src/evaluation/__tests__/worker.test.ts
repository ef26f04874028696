/**
 * Evaluation Worker Tests
 */

import type { Job } from 'bullmq';
import type { SignalEvaluationJob } from '@trend-alert/shared';
import type { EvaluationService } from '../services/EvaluationService';
import { createEvaluationProcessor } from '../worker';

describe('Evaluation Worker', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createEvaluationProcessor', () => {
    it('should run one cycle for the job pair', async () => {
      const runCycle = jest.fn().mockResolvedValue({ outcome: 'SUPPRESSED', decision: null, changes: null });
      const service = { runCycle } as unknown as EvaluationService;
      const job = { data: { symbol: 'SOLUSDT', timeframe: '15m' } } as unknown as Job<SignalEvaluationJob>;

      await createEvaluationProcessor(service)(job);

      expect(runCycle).toHaveBeenCalledWith('SOLUSDT', '15m');
      expect(console.log).toHaveBeenCalledWith('[Worker] SOLUSDT:15m -> SUPPRESSED');
    });

    it('should let cycle failures reach BullMQ', async () => {
      const runCycle = jest.fn().mockRejectedValue(new Error('Binance API timeout'));
      const service = { runCycle } as unknown as EvaluationService;
      const job = { data: { symbol: 'SOLUSDT', timeframe: '15m' } } as unknown as Job<SignalEvaluationJob>;

      await expect(createEvaluationProcessor(service)(job)).rejects.toThrow('Binance API timeout');
    });
  });
});
