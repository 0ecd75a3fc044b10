export type MessageTone = 'success' | 'info' | 'warning' | 'error';

export type MessageParams = Record<string, unknown>;

export type MessageDefinition = {
  key: string;
  title: string;
  body: string;
  tone: MessageTone;
};

const definitions: Record<string, MessageDefinition> = {
  'program.archived': {
    key: 'program.archived',
    title: 'New Program Posted',
    body:
      'Part: {{part}} (v{{version}})\nProject: {{project}}\nSetup: {{setup}}\nMachine: {{machine}}\nTools: {{toolCount}}{{warningBlock}}\n\nFile ready on the share.',
    tone: 'success'
  },
  'program.failed': {
    key: 'program.failed',
    title: 'Error Processing Program',
    body: 'Error processing {{fileName}}: {{error}}',
    tone: 'error'
  },
  'agent.online': {
    key: 'agent.online',
    title: 'Chip Warden Online',
    body: 'Watching {{watchDir}} for new programs.',
    tone: 'info'
  },
  'agent.offline': {
    key: 'agent.offline',
    title: 'Chip Warden Stopping',
    body: 'No longer watching {{watchDir}}.',
    tone: 'warning'
  }
};

function render(template: string, params?: MessageParams): string {
  if (!params) return template;
  return template.replace(/{{\s*([\w.]+)\s*}}/g, (_match, key: string) => {
    const value = params[key];
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
    return String(value);
  });
}

export function getMessageDefinition(key: string): MessageDefinition | undefined {
  return definitions[key];
}

export function formatAppMessage(
  key: string,
  params?: MessageParams
): { definition: MessageDefinition; title: string; body: string } {
  const fallback: MessageDefinition = { key, title: key, body: '', tone: 'info' };
  const definition = getMessageDefinition(key) ?? fallback;
  const title = render(definition.title, params);
  const body = render(definition.body, params);
  return { definition, title, body };
}
