import pino from 'pino';
import { SlackTransport } from './slack-transport';

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function resolveLevel(value: string | undefined): pino.LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'info';
}

export const logger = () => {
  const logLevel = resolveLevel(process.env.LOG_LEVEL);
  const slackWebhook = process.env.SLACK_WEBHOOK_URL;

  const streams: pino.StreamEntry[] = [
    {
      level: logLevel === 'silent' ? 'fatal' : logLevel,
      stream: process.stdout,
    },
  ];

  if (slackWebhook) {
    streams.push({
      level: 'warn',
      stream: new SlackTransport(slackWebhook, 'warn'),
    });
  }

  return pino(
    {
      level: logLevel,
      base: { service: 'tenant-billing-api' },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.multistream(streams),
  );
};

export type Logger = ReturnType<typeof logger>;
