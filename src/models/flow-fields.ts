/**
 * Flow meter channel layout
 *
 * A device reports up to nine flow transmitters (FT1..FT9), each with the
 * same six measurements. Every field on the wire and every column in
 * flow_meter_readings is named `FT<channel><measurement>`.
 */
export const FLOW_CHANNELS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export type FlowChannel = (typeof FLOW_CHANNELS)[number];

export const FLOW_MEASUREMENTS = [
  'MassFlow',
  'Masstotal',
  'VolumeFlow',
  'Volumetotal',
  'Temp',
  'Density',
] as const;

export type FlowMeasurement = (typeof FLOW_MEASUREMENTS)[number];

export type FlowFieldKey = `FT${FlowChannel}${FlowMeasurement}`;

/**
 * Human-readable labels, used for API documentation
 */
export const FLOW_MEASUREMENT_LABELS: Record<FlowMeasurement, string> = {
  MassFlow: 'Mass flow rate',
  Masstotal: 'Cumulative mass total',
  VolumeFlow: 'Volume flow rate',
  Volumetotal: 'Cumulative volume total',
  Temp: 'Temperature',
  Density: 'Density',
};

export function flowFieldKey(
  channel: FlowChannel,
  measurement: FlowMeasurement,
): FlowFieldKey {
  return `FT${channel}${measurement}`;
}

/**
 * All 54 field keys in canonical order (channel-major).
 * Column lists and insert statements follow this order.
 */
export const FLOW_FIELD_KEYS: readonly FlowFieldKey[] = FLOW_CHANNELS.flatMap(
  (channel) =>
    FLOW_MEASUREMENTS.map((measurement) => flowFieldKey(channel, measurement)),
);

export type FlowMeasurements = Record<FlowFieldKey, number | null>;

/**
 * Storage type of every measurement column. 18 digits with 4 after the
 * point leaves 14 before it, so magnitudes from 1e14 up overflow.
 */
export const MEASUREMENT_COLUMN_TYPE = 'numeric(18,4)';
export const MEASUREMENT_MAGNITUDE_LIMIT = 1e14;

function coversAllFlowFields<T>(
  values: Partial<Record<FlowFieldKey, T>>,
): values is Record<FlowFieldKey, T> {
  return FLOW_FIELD_KEYS.every((key) => key in values);
}

/**
 * Build a complete field-keyed record by projecting every key.
 */
export function mapFlowFields<T>(
  project: (key: FlowFieldKey) => T,
): Record<FlowFieldKey, T> {
  const values: Partial<Record<FlowFieldKey, T>> = {};
  for (const key of FLOW_FIELD_KEYS) {
    values[key] = project(key);
  }

  if (!coversAllFlowFields(values)) {
    throw new Error('Flow field projection did not cover every channel');
  }
  return values;
}
