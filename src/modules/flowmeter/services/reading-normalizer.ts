import {
  InvalidDeviceIdException,
  MalformedRequestException,
  MissingDeviceIdException,
} from '../../../common/exceptions';
import {
  mapFlowFields,
  MEASUREMENT_MAGNITUDE_LIMIT,
  NormalizedReading,
} from '../../../models';

/**
 * Token the SCADA uploader writes around (or instead of) a value that it
 * has not sampled yet, e.g. "$$12.5$$" or "$$   $$".
 */
export const PLACEHOLDER_MARKER = '$$';

export const DEVICE_ID_FIELD = 'deviceid';
export const DEVICE_ID_MAX_LENGTH = 64;

// Plain decimal literal: sign, digits, optional fraction, optional exponent.
// Rejects hex, "Infinity", "1_000" and the empty string that Number() accepts.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce one telemetry field to a number.
 *
 * Anything that is not a string, is empty once placeholders are stripped,
 * is not a finite decimal, or does not fit the measurement column becomes
 * null. Never throws.
 */
export function parseMeasurement(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }

  const cleaned = value.split(PLACEHOLDER_MARKER).join('').trim();
  if (cleaned.length === 0 || !DECIMAL_LITERAL.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  if (!Number.isFinite(parsed) || Math.abs(parsed) >= MEASUREMENT_MAGNITUDE_LIMIT) {
    return null;
  }
  return parsed;
}

function isPayloadObject(payload: unknown): payload is Record<string, unknown> {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    !Array.isArray(payload) &&
    Object.keys(payload).length > 0
  );
}

/**
 * Turn an upload body into a device id plus all 54 channel measurements.
 *
 * Unknown keys are ignored. Only the device id can make the call fail.
 */
export function normalizeReading(payload: unknown): NormalizedReading {
  if (!isPayloadObject(payload)) {
    throw new MalformedRequestException();
  }

  const rawDeviceId = payload[DEVICE_ID_FIELD];
  if (typeof rawDeviceId !== 'string' || rawDeviceId.trim().length === 0) {
    throw new MissingDeviceIdException();
  }

  const deviceId = rawDeviceId.trim();
  if (deviceId.length > DEVICE_ID_MAX_LENGTH) {
    throw new InvalidDeviceIdException(
      `Device ID must not exceed ${DEVICE_ID_MAX_LENGTH} characters`,
    );
  }

  return {
    deviceId,
    measurements: mapFlowFields((key) => parseMeasurement(payload[key])),
  };
}

export function countPresentMeasurements(reading: NormalizedReading): number {
  return Object.values(reading.measurements).filter((value) => value !== null)
    .length;
}
