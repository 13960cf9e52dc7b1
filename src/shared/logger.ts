/**
 * Stream Scanner — Logger Factory
 *
 * One pino instance per area, named `scanner:<area>`. Level comes from
 * LOG_LEVEL (debug, info, warn, error). Records go to stderr unless another
 * destination is given, so they never mix with output a program writes to
 * stdout.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { LOG_DESTINATION_FD } from './constants.js';

export type { DestinationStream, Logger };

export function createLogger(
  area: string,
  destination: DestinationStream = pino.destination(LOG_DESTINATION_FD)
): Logger {
  return pino(
    {
      name: `scanner:${area}`,
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    destination
  );
}
