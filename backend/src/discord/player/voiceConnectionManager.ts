import { VoiceBasedChannel } from 'discord.js';
import {
  joinVoiceChannel,
  getVoiceConnection,
  entersState,
  VoiceConnection,
  VoiceConnectionStatus,
} from '@discordjs/voice';
import logger from '../../utils/logger.js';
import { VOICE_READY_TIMEOUT_MS } from '../../config.js';
import { AudioPlaybackEngine } from './audioPlaybackEngine.js';
import { VoiceGateway, VoiceLink } from './types.js';

const RECONNECT_GRACE_MS = 5000;

export class DiscordVoiceLink implements VoiceLink {
  constructor(private readonly connection: VoiceConnection) {}

  get channelId(): string {
    return this.connection.joinConfig.channelId ?? '';
  }

  isConnected(): boolean {
    const status = this.connection.state.status;
    return status !== VoiceConnectionStatus.Destroyed && status !== VoiceConnectionStatus.Disconnected;
  }

  destroy(): void {
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }
}

/** Joins, moves and recovers guild voice connections. */
export class VoiceConnectionManager implements VoiceGateway<VoiceBasedChannel, AudioPlaybackEngine> {
  public async join(sessionKey: string, channel: VoiceBasedChannel, sink: AudioPlaybackEngine): Promise<VoiceLink> {
    const existing = getVoiceConnection(channel.guild.id);

    if (existing && existing.state.status !== VoiceConnectionStatus.Destroyed) {
      if (existing.joinConfig.channelId !== channel.id) {
        logger.info(`[VCM] ${sessionKey}: moving to ${channel.name} (${channel.id})`);
        existing.rejoin({ channelId: channel.id, selfDeaf: true, selfMute: false });
      }
      await entersState(existing, VoiceConnectionStatus.Ready, VOICE_READY_TIMEOUT_MS);
      sink.attachTo(existing);
      return new DiscordVoiceLink(existing);
    }

    logger.info(`[VCM] ${sessionKey}: joining voice channel ${channel.name} (${channel.id})`);
    const connection = joinVoiceChannel({
      channelId: channel.id,
      guildId: channel.guild.id,
      adapterCreator: channel.guild.voiceAdapterCreator,
      selfDeaf: true,
      selfMute: false,
    });
    this.watchConnection(sessionKey, connection);

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, VOICE_READY_TIMEOUT_MS);
    } catch (error) {
      logger.error(`[VCM] ${sessionKey}: voice connection never became ready`, error);
      connection.destroy();
      throw error;
    }

    sink.attachTo(connection);
    return new DiscordVoiceLink(connection);
  }

  private watchConnection(sessionKey: string, connection: VoiceConnection): void {
    connection.on(VoiceConnectionStatus.Disconnected, async () => {
      logger.warn(`[VCM] ${sessionKey}: voice connection Disconnected`);
      try {
        await Promise.race([
          entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
          entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS),
        ]);
        // Seems to be reconnecting to a new channel
        logger.info(`[VCM] ${sessionKey}: voice connection recovering`);
      } catch {
        logger.warn(`[VCM] ${sessionKey}: voice connection did not recover, destroying`);
        if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
          connection.destroy();
        }
      }
    });

    connection.on('error', (error) => {
      logger.error(`[VCM] ${sessionKey}: voice connection error:`, error);
    });
  }
}
