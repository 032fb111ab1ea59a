import type { Logger } from 'pino';

import type { SafeMode } from '../config.js';
import { automationTools } from './automations.js';
import { entityTools } from './entities.js';
import { helperTools } from './helpers.js';
import { ToolRegistry } from './registry.js';
import { sceneTools } from './scenes.js';
import { scheduleTools } from './schedules.js';
import { serviceTools } from './services.js';
import { targetTools } from './targets.js';
import { timerTools } from './timers.js';

export const allTools = [
  ...entityTools,
  ...automationTools,
  ...helperTools,
  ...timerTools,
  ...scheduleTools,
  ...sceneTools,
  ...targetTools,
  ...serviceTools
];

export function buildToolRegistry(options: { safeMode: SafeMode; logger: Logger }): ToolRegistry {
  return new ToolRegistry(options).register(...allTools);
}
