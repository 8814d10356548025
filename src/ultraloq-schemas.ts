/* Copyright(C) 2020-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-schemas.ts: Response and configuration schemas for Ultraloq.
 */
import { ULTRALOQ_MQTT_TOPIC } from "./settings.js";
import { z } from "zod";

// An account entry in the plugin configuration. The Homebridge UI may hand us an address id as a string.
export const accountConfigSchema = z.object({

  addressId: z.union([ z.number().int(), z.string().regex(/^\d+$/).transform(Number) ]).optional().catch(undefined),
  email: z.string().catch(""),
  mqttTopic: z.string().min(1).catch(ULTRALOQ_MQTT_TOPIC),
  mqttUrl: z.string().min(1).optional().catch(undefined),
  name: z.string().min(1).optional().catch(undefined),
  password: z.string().catch("")
});

// The cloud is inconsistent about whether flags and counters come back as numbers, strings, or booleans.
const numeric = z.coerce.number().default(0);

// Every response shares this envelope. A code of 200 means success, regardless of the HTTP status.
export const envelopeSchema = z.object({

  code: z.coerce.number(),
  data: z.unknown().optional(),
  description: z.string().nullish()
});

export const tokenSchema = z.object({

  token: z.string().optional(),
  urls: z.object({

    utec: z.string().optional()
  }).optional()
});

export const loginSchema = z.object({

  uuid: z.union([ z.string(), z.number() ]).optional()
});

export const addressListSchema = z.array(z.object({

  id: z.coerce.number(),
  name: z.string().nullish().transform(value => value ?? "")
}));

export const deviceSchema = z.object({

  bridge: z.record(z.unknown()).nullish(),
  model: z.string().nullish(),
  name: z.string().nullish(),
  params: z.record(z.unknown()).nullish(),
  status: z.unknown().optional(),
  user: z.object({

    uid: z.union([ z.number(), z.string() ]).nullish()
  }).nullish(),
  uuid: z.string().nullish()
});

export const deviceGroupListSchema = z.array(z.object({

  devices: z.array(deviceSchema).nullish().transform(value => value ?? []),
  id: z.union([ z.number(), z.string() ]).nullish()
}));

export const lockStatusSchema = z.object({

  battery: numeric,
  ble_strength: numeric,
  is_jam: numeric,
  is_locked: numeric,
  lasttime: numeric,
  model: z.string().nullish(),
  net_strength: numeric,
  online: numeric,
  sleep: numeric,
  timestamp: numeric,
  uuid: z.string().nullish(),
  version: z.union([ z.string(), z.number() ]).nullish().transform(value => String(value ?? "")),
  wifi_strength: numeric
});

export const onlineStatusSchema = z.object({

  ble: numeric,
  remote: numeric
}).passthrough();

export type UltraloqDeviceGroup = z.infer<typeof deviceGroupListSchema>[number];
