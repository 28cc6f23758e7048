import type { Logger, PlatformClient } from "@wardline/schemas";

/**
 * Stand-in platform that only logs what it was asked to do. Used until a
 * chat platform adapter is plugged into the runtime.
 */
export class LoggingPlatformClient implements PlatformClient {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async stripRoles(userId: string, reason: string): Promise<string[]> {
    this.logger.info("strip roles", { user_id: userId, reason });
    return [];
  }

  async assignRole(userId: string, roleId: string, reason: string): Promise<void> {
    this.logger.info("assign role", { user_id: userId, role_id: roleId, reason });
  }

  async removeRole(userId: string, roleId: string, reason: string): Promise<void> {
    this.logger.info("remove role", { user_id: userId, role_id: roleId, reason });
  }

  async restoreRoles(userId: string, roleIds: string[], reason: string): Promise<void> {
    this.logger.info("restore roles", { user_id: userId, role_ids: roleIds, reason });
  }

  async restrictToChannel(userId: string, channelId: string, reason: string): Promise<void> {
    this.logger.info("restrict to channel", { user_id: userId, channel_id: channelId, reason });
  }

  async lockChannel(channelId: string, reason: string): Promise<void> {
    this.logger.info("lock channel", { channel_id: channelId, reason });
  }

  async unlockChannel(channelId: string, reason: string): Promise<void> {
    this.logger.info("unlock channel", { channel_id: channelId, reason });
  }

  async timeoutMember(userId: string, until: string, reason: string): Promise<void> {
    this.logger.info("timeout member", { user_id: userId, until, reason });
  }

  async banMember(userId: string, reason: string): Promise<void> {
    this.logger.info("ban member", { user_id: userId, reason });
  }

  async sendDirectMessage(userId: string, message: string): Promise<void> {
    this.logger.info("direct message", { user_id: userId, length: message.length });
  }

  async postAlert(channelId: string, message: string): Promise<void> {
    this.logger.info("post alert", { channel_id: channelId, message });
  }
}
