/**
 * Metrics registry tests
 */

import { enableDefaultMetrics, register } from '@meterline/shared';

describe('enableDefaultMetrics', () => {
  it('adds process metrics to the registry once', () => {
    expect(register.getSingleMetric('process_cpu_user_seconds_total')).toBeUndefined();

    enableDefaultMetrics();
    enableDefaultMetrics();

    expect(register.getSingleMetric('process_cpu_user_seconds_total')).toBeDefined();
    expect(register.getSingleMetric('meterline_queue_depth')).toBeDefined();
  });
});
