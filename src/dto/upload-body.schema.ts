import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';
import {
  FLOW_CHANNELS,
  FLOW_MEASUREMENT_LABELS,
  FLOW_MEASUREMENTS,
  flowFieldKey,
} from '../models';
import { DEVICE_ID_FIELD } from '../modules/flowmeter/services/reading-normalizer';

/**
 * OpenAPI schema for the SCADA upload body: deviceid plus one optional
 * string per channel measurement. Values may carry the $$ placeholder.
 */
export function buildUploadBodySchema(): SchemaObject {
  const properties: Record<string, SchemaObject> = {
    [DEVICE_ID_FIELD]: {
      type: 'string',
      description: 'Originating device identifier',
      example: 'FM-7',
    },
  };

  for (const channel of FLOW_CHANNELS) {
    for (const measurement of FLOW_MEASUREMENTS) {
      properties[flowFieldKey(channel, measurement)] = {
        type: 'string',
        description: `FT${channel} ${FLOW_MEASUREMENT_LABELS[measurement].toLowerCase()}`,
        example: channel === 1 ? '$$12.5$$' : '$$  $$',
      };
    }
  }

  return {
    type: 'object',
    required: [DEVICE_ID_FIELD],
    properties,
    additionalProperties: true,
  };
}
