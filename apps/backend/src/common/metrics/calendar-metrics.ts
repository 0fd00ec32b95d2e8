import { Counter, register } from 'prom-client';

// Prometheus metrics for calendar conversions
export const lunarConversionsTotal = new Counter({
  name: 'lunar_conversions_total',
  help: 'Total number of calendar conversions served',
  labelNames: ['operation'],
  registers: [register],
});

export const invalidCalendarInputTotal = new Counter({
  name: 'invalid_calendar_input_total',
  help: 'Requests rejected because the date does not exist in the calendar',
  labelNames: ['operation'],
  registers: [register],
});
