import { CHANNEL_IDS, isChannelId, type ChannelId, type PolicyTable } from '../types';
import { DomainError } from '../errors';
import { createChannelCalculator, type ChannelCalculator } from './channel-calculators';
import { DEFAULT_POLICY_TABLE } from './policy-loader';

/**
 * Resolves channel identifiers to calculators.
 * One calculator per channel, built when the factory is created and shared by every request.
 */
export class CalculatorFactory {
  private readonly calculators: ReadonlyMap<ChannelId, ChannelCalculator>;
  readonly policies: PolicyTable;

  constructor(policies: PolicyTable = DEFAULT_POLICY_TABLE) {
    this.policies = policies;
    this.calculators = new Map(
      CHANNEL_IDS.map((channel): [ChannelId, ChannelCalculator] => [channel, createChannelCalculator(policies[channel])])
    );
  }

  /**
   * Case-insensitive lookup, surrounding whitespace ignored
   */
  static normalize(channel: string): string {
    return channel.trim().toLowerCase();
  }

  get(channel: string): ChannelCalculator {
    const normalized = CalculatorFactory.normalize(channel);
    const calculator = isChannelId(normalized) ? this.calculators.get(normalized) : undefined;

    if (!calculator) {
      const supported = this.supportedChannels();
      throw new DomainError(
        'UNSUPPORTED_CHANNEL',
        `Channel '${channel}' is not supported. Available channels: ${supported.join(', ')}`,
        supported
      );
    }

    return calculator;
  }

  supportedChannels(): ChannelId[] {
    return [...CHANNEL_IDS];
  }

  isSupported(channel: string): boolean {
    return isChannelId(CalculatorFactory.normalize(channel));
  }
}
