import type { ChannelConfig } from '../config/profile';
import { createLogger, type Logger } from '../utils/logger';
import { FeishuNotifier } from './feishu';
import type { Notifier } from './types';

type NotifierFactory = (config: ChannelConfig) => Notifier;

export const NOTIFIER_REGISTRY: Record<string, NotifierFactory> = {
  feishu: (config) => FeishuNotifier.fromChannelConfig(config),
};

/** Builds a notifier per configured channel; unknown channel types are logged and skipped. */
export function buildNotifiers(
  channels: ChannelConfig[],
  registry: Record<string, NotifierFactory> = NOTIFIER_REGISTRY,
  logger: Logger = createLogger('Notifiers')
): Notifier[] {
  const notifiers: Notifier[] = [];
  for (const channel of channels) {
    const factory = registry[channel.type];
    if (!factory) {
      logger.warn(`Unknown channel type "${channel.type}"; skipping`);
      continue;
    }
    notifiers.push(factory(channel));
  }
  return notifiers;
}
