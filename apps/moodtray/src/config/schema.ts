/**
 * On-disk configuration format (config/moodtray.json). Unknown keys are
 * stripped by zod, so older files with extra sections still load.
 */

import { z } from 'zod';

const percent = z.number().min(0).max(100);
const kbps = z.number().nonnegative();

export const calmSchema = z.object({
  cpu_max: percent,
  ram_max: percent,
  network_max_kbps: kbps,
}).partial();

export const busySchema = z.object({
  cpu_busy: percent,
  ram_busy: percent,
  network_busy_kbps: kbps,
  single_resource_threshold: percent,
}).partial();

export const stressedSchema = z.object({
  multiple_resources_threshold: z.number().int().min(1).max(3),
  cpu_high: percent,
  ram_high: percent,
  network_high_kbps: kbps,
}).partial();

export const overloadedSchema = z.object({
  cpu_critical: percent,
  ram_critical: percent,
  network_critical_kbps: kbps,
  any_critical_threshold: percent,
}).partial();

export const emotionThresholdsSchema = z.object({
  calm: calmSchema.default({}),
  busy: busySchema.default({}),
  stressed: stressedSchema.default({}),
  overloaded: overloadedSchema.default({}),
});

export const settingsSchema = z.object({
  poll_interval_ms: z.number().int().positive(),
  animation_interval_ms: z.number().int().positive(),
  dwell_cycles: z.number().int().min(1),
  max_playback_multiplier: z.number().min(1),
  stress_smoothing: z.number().gt(0).max(1),
  animation_mode: z.enum(['emotion', 'cpu', 'ram', 'network']),
  current_skin: z.string().min(1),
}).partial();

const animationSchema = z.object({
  fps: z.number().positive(),
});

export const skinSchema = z.object({
  name: z.string().optional(),
  animations: z.object({
    calm: animationSchema,
    active: animationSchema,
    busy: animationSchema,
    stressed: animationSchema,
    overloaded: animationSchema,
  }).partial().default({}),
});

export const moodConfigFileSchema = z.object({
  emotion_thresholds: emotionThresholdsSchema.default({}),
  settings: settingsSchema.default({}),
  skins: z.record(skinSchema).default({}),
});

export type MoodConfigFile = z.infer<typeof moodConfigFileSchema>;
