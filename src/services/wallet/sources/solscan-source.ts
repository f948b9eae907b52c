import { BaseWalletSource, WalletSourceConfig } from './base-source';
import { AccountPayload, accountPayloadSchema, ListPayload, listPayloadSchema } from './schemas';

export class SolscanSource extends BaseWalletSource {
  constructor(config: WalletSourceConfig) {
    super('solscan', config);
  }

  async getAccount(account: string): Promise<AccountPayload> {
    return this.get('/account', accountPayloadSchema, { address: account });
  }

  // Most recent first, as Solscan orders them
  async getTransactions(account: string, limit: number): Promise<ListPayload> {
    return this.get('/account/transactions', listPayloadSchema, { address: account, limit });
  }
}
