/**
 * Sensor readings exposed to the host for one portfolio
 */

import type { PortfolioConfig, PortfolioSnapshot } from '../models/Portfolio';
import { entitySlug } from '../services/PortfolioCoordinator';

export interface SensorReading {
  entityId: string;
  name: string;
  /** null until the first snapshot arrives */
  value: number | null;
  /** Currency code, or % for ratios */
  unit: string;
  updatedAt: Date | null;
}

type SnapshotMetric = 'investedCapital' | 'openPL' | 'openPLPercent' | 'dailyPL' | 'dailyPLPercent';

const READINGS: ReadonlyArray<{ suffix: string; label: string; metric: SnapshotMetric; percent: boolean }> = [
  { suffix: '', label: 'Invested Capital', metric: 'investedCapital', percent: false },
  { suffix: '_openpl', label: 'Open P&L', metric: 'openPL', percent: false },
  { suffix: '_openplperc', label: 'Open P&L %', metric: 'openPLPercent', percent: true },
  { suffix: '_dailypl', label: 'Daily P&L', metric: 'dailyPL', percent: false },
  { suffix: '_dailyplperc', label: 'Daily P&L %', metric: 'dailyPLPercent', percent: true }
];

export function toSensorReadings(
  config: PortfolioConfig,
  snapshot: PortfolioSnapshot | null,
  defaultCurrency: string = 'EUR'
): SensorReading[] {
  const slug = entitySlug(config);
  const currency = snapshot?.currency ?? defaultCurrency;

  return READINGS.map(reading => ({
    entityId: `${slug}${reading.suffix}`,
    name: `${config.displayName} ${reading.label}`,
    value: snapshot ? snapshot[reading.metric] : null,
    unit: reading.percent ? '%' : currency,
    updatedAt: snapshot?.fetchedAt ?? null
  }));
}
