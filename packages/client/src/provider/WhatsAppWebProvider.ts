import type { ChatProviderType } from "@whatsweb/shared";
import type { IChatProvider } from "./IChatProvider.js";
import { WhatsAppClient, type WhatsAppClientOptions } from "../client/whatsapp-client.js";

/**
 * Chat provider backed by a WhatsApp Web browser session. Channel ids are
 * contact identifiers: the display name (or prefix) typed into the search box.
 */
export class WhatsAppWebProvider implements IChatProvider {
  readonly id: ChatProviderType = "whatsapp-web";
  readonly name = "WhatsApp Web";
  readonly client: WhatsAppClient;

  constructor(client: WhatsAppClient | WhatsAppClientOptions = {}) {
    this.client = client instanceof WhatsAppClient ? client : new WhatsAppClient(client);
  }

  async start(): Promise<void> {
    await this.client.initialize();
    await this.client.login();
  }

  async stop(): Promise<void> {
    await this.client.close();
  }

  async sendMessage(channelId: string, content: string): Promise<void> {
    const sent = await this.client.sendMessage(channelId, content);
    if (!sent) {
      throw new Error(`Could not open WhatsApp chat "${channelId}"`);
    }
  }
}
