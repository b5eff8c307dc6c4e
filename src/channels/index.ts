import type { Config } from "../config.js";
import type { FormatConverter } from "../convert.js";
import type { Logger } from "../log.js";
import type { ChannelSet } from "./channel.js";
import { MailgunChannel } from "./mailgun.js";
import { PushoverChannel } from "./pushover.js";

export { batchTitle, destinationsOf, type ChannelSet, type DeliveryChannel, type Destination } from "./channel.js";

/**
 * Channels for the services that have credentials configured. A destination
 * kind without a channel fails delivery as a configuration error.
 */
export function createChannels(config: Config, converter: FormatConverter, logger: Logger): ChannelSet {
  const channels: ChannelSet = {};
  if (config.mailgun) {
    channels.kindle = new MailgunChannel(config.mailgun, converter, logger.child("mailgun"));
  }
  if (config.pushoverToken) {
    channels.pushover = new PushoverChannel(config.pushoverToken, logger.child("pushover"));
  }
  return channels;
}
