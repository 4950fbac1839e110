import { VoiceState } from 'discord.js';
import logger from '../../utils/logger.js';

// Structural subset of discord.js VoiceState
export type VoiceStateSnapshot = Pick<VoiceState, 'id' | 'channelId'> & {
  guild: { id: string };
};

export interface ForcedRemovalTarget {
  hasSession(sessionKey: string): boolean;
  handleForcedRemoval(sessionKey: string): Promise<void>;
}

export async function handleVoiceStateUpdate(
  oldState: VoiceStateSnapshot,
  newState: VoiceStateSnapshot,
  botUserId: string | undefined,
  registry: ForcedRemovalTarget,
): Promise<void> {
  try {
    // Only the bot's own voice state matters here
    if (!botUserId || oldState.id !== botUserId) {
      return;
    }

    const sessionKey = oldState.guild.id;
    if (oldState.channelId && !newState.channelId && registry.hasSession(sessionKey)) {
      logger.info(`[VSU] Removed from voice in ${sessionKey}, clearing session`);
      await registry.handleForcedRemoval(sessionKey);
    }
  } catch (error) {
    logger.error('[VSU] Voice state update error:', error);
  }
}
