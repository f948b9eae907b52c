import { BaseWalletSource, WalletSourceConfig } from './base-source';
import { AccountPayload, accountPayloadSchema } from './schemas';

export class HeliusSource extends BaseWalletSource {
  constructor(config: WalletSourceConfig) {
    super('helius', config);
  }

  async getBalance(account: string): Promise<AccountPayload> {
    return this.get(`/addresses/${encodeURIComponent(account)}/balances`, accountPayloadSchema);
  }
}
