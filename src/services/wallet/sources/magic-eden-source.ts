import { BaseWalletSource, WalletSourceConfig } from './base-source';
import { ListPayload, listPayloadSchema } from './schemas';

export class MagicEdenSource extends BaseWalletSource {
  constructor(config: WalletSourceConfig) {
    super('magic-eden', config);
  }

  async getTokens(account: string): Promise<ListPayload> {
    return this.get(`/wallets/${encodeURIComponent(account)}/tokens`, listPayloadSchema);
  }

  async getNfts(account: string): Promise<ListPayload> {
    return this.get(`/wallets/${encodeURIComponent(account)}/nfts`, listPayloadSchema);
  }
}
