import debug from 'debug';

export const NAMESPACES = {
  context: {
    assembler: 'chapterwise:context:assembler'
  },
  stores: {
    character: 'chapterwise:stores:character'
  },
  services: {
    tracking: 'chapterwise:services:tracking',
    project: 'chapterwise:services:project'
  },
  agents: {
    base: 'chapterwise:agents:base',
    writer: 'chapterwise:agents:writer',
    summarize: 'chapterwise:agents:summarize',
    analysis: 'chapterwise:agents:analysis'
  },
  llm: {
    client: 'chapterwise:llm:client'
  },
  config: 'chapterwise:config'
} as const;

export interface LoggingSettings {
  enabledNamespaces?: string;
}

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Enable the namespaces listed in the configuration on top of whatever
 * DEBUG already turned on.
 */
export function configureLogging(settings?: LoggingSettings): void {
  const requested = settings?.enabledNamespaces?.trim();
  if (!requested) return;
  const current = debug.disable();
  debug.enable(current ? `${current},${requested}` : requested);
}
