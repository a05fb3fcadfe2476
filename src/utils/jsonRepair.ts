import { jsonrepair } from 'jsonrepair';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.agents.base);

/** Repaired JSON text, or null when jsonrepair cannot make sense of the input. */
export default function tryJsonRepair(input: string): string | null {
  try {
    return jsonrepair(input);
  } catch (error) {
    log('jsonrepair failed: %s', error instanceof Error ? error.message : String(error));
    return null;
  }
}
