import { StubRoutes } from '../../../test/http-stub';
import { createTestWallet, outageRoutes, paths, ProviderRoutes, TEST_WALLET } from '../../../test/wallet-fixtures';

const healthyRoutes = (transactions: unknown[] = []): ProviderRoutes => ({
  helius: { [paths.heliusBalance]: { status: 200, data: { nativeBalance: 2500000000 } } },
  solscan: {
    [paths.solscanAccount]: { status: 200, data: { lamports: 2500000000 } },
    [paths.solscanTransactions]: { status: 200, data: transactions },
  },
  magicEden: {
    [paths.magicEdenTokens]: { status: 200, data: [{ mint: 'token-a' }, { mint: 'token-b' }] },
    [paths.magicEdenNfts]: { status: 200, data: [{ mint: 'nft-a' }, { mint: 'nft-b' }, { mint: 'nft-c' }] },
  },
});

// ─── monitor ──────────────────────────────────────────────────────────────────

describe('WalletAggregator.monitor', () => {
  /**
   * Every provider failing still produces a success-shaped snapshot.
   */
  it('should return a success snapshot when every provider fails', async () => {
    const { wallet } = createTestWallet(outageRoutes);

    const snapshot = await wallet.monitor();

    expect(snapshot.status).toBe('success');
    expect(snapshot.wallet).toBe(TEST_WALLET);
    expect(snapshot.balance).toMatchObject({
      status: 'pending',
      wallet: TEST_WALLET,
      message: 'Wallet monitoring active',
      failures: [
        { provider: 'helius', kind: 'http', status: 500 },
        { provider: 'solscan', kind: 'timeout' },
      ],
    });
    expect(snapshot.tokens).toMatchObject({ status: 'pending', count: 0 });
    expect(snapshot.transactions).toMatchObject({ status: 'pending', count: 0 });
    expect(snapshot.profitTracking.sessions).toBe(1);
    expect(snapshot.profitTracking.lastProfit).toBe(0);
    expect(snapshot.profitTracking.totalProfit).toBe(0);
  });

  it('should advance the session counter once per call whatever the outcome', async () => {
    const { wallet } = createTestWallet(outageRoutes);
    const before = wallet.trackProfit().sessions;

    await wallet.monitor();
    await wallet.monitor();
    await wallet.monitor();

    expect(wallet.trackProfit().sessions).toBe(before + 3);
  });

  it('should add the profit of the first five transactions to the total', async () => {
    const transactions = [
      { amount: 3 },
      { amount: 'bad' },
      { amount: -1 },
      { signature: 'no-amount' },
      { amount: 2 },
      { amount: 1000 },
    ];
    const { wallet } = createTestWallet(healthyRoutes(transactions));

    const first = await wallet.monitor();
    expect(first.profitTracking.lastProfit).toBe(4);
    expect(first.profitTracking.totalProfit).toBe(4);

    const second = await wallet.monitor();
    expect(second.profitTracking.lastProfit).toBe(4);
    expect(second.profitTracking.totalProfit).toBe(8);
    expect(second.profitTracking.sessions).toBe(2);
  });

  it('should let the total go negative', async () => {
    const { wallet } = createTestWallet(healthyRoutes([{ amount: -2.5 }]));

    const snapshot = await wallet.monitor();

    expect(snapshot.profitTracking.totalProfit).toBe(-2.5);
  });

  it('should request ten transactions', async () => {
    const { wallet, calls } = createTestWallet(healthyRoutes());

    await wallet.monitor();

    const transactionCall = calls.find(call => call.url === paths.solscanTransactions);
    expect(transactionCall?.params).toEqual({ address: TEST_WALLET, limit: 10 });
  });

  it('should assemble the other parts when one provider fails', async () => {
    const routes = healthyRoutes([{ amount: 1 }]);
    routes.magicEden = { [paths.magicEdenTokens]: { error: 'network' } };
    const { wallet } = createTestWallet(routes);

    const snapshot = await wallet.monitor();

    expect(snapshot.balance).toMatchObject({ status: 'success', source: 'helius' });
    expect(snapshot.tokens).toMatchObject({ status: 'pending', message: 'Token balances unavailable' });
    expect(snapshot.transactions).toMatchObject({ status: 'success', count: 1 });
    expect(snapshot.profitTracking.lastProfit).toBe(1);
  });

  it('should turn an unexpected source error into a placeholder', async () => {
    const { wallet, sources } = createTestWallet(healthyRoutes());
    jest.spyOn(sources.magicEden, 'getTokens').mockRejectedValue(new TypeError('boom'));

    const snapshot = await wallet.monitor();

    expect(snapshot.status).toBe('success');
    expect(snapshot.tokens).toMatchObject({
      status: 'pending',
      wallet: TEST_WALLET,
      message: 'Token balances unavailable',
      failures: [{ provider: 'magic-eden', kind: 'unexpected', message: 'boom' }],
      count: 0,
    });
    expect(snapshot.profitTracking.sessions).toBe(1);
  });
});

// ─── balance ──────────────────────────────────────────────────────────────────

describe('WalletAggregator.getBalance', () => {
  it('should use the primary provider when it answers', async () => {
    const { wallet, calls } = createTestWallet(healthyRoutes());

    const balance = await wallet.getBalance();

    expect(balance).toMatchObject({
      status: 'success',
      wallet: TEST_WALLET,
      source: 'helius',
      balance: { nativeBalance: 2500000000 },
    });
    expect(calls.map(call => call.url)).toEqual([paths.heliusBalance]);
  });

  it('should fall back to Solscan when Helius is rate limited', async () => {
    const routes = healthyRoutes();
    routes.helius = { [paths.heliusBalance]: { status: 429 } };
    const { wallet } = createTestWallet(routes);

    const balance = await wallet.getBalance();

    expect(balance).toMatchObject({
      status: 'success',
      source: 'solscan',
      balance: { lamports: 2500000000 },
    });
  });

  it('should fall back to Solscan when Helius throws unexpectedly', async () => {
    const { wallet, sources } = createTestWallet(healthyRoutes());
    jest.spyOn(sources.helius, 'getBalance').mockRejectedValue(new TypeError('boom'));

    const balance = await wallet.getBalance();

    expect(balance).toMatchObject({
      status: 'success',
      source: 'solscan',
      balance: { lamports: 2500000000 },
    });
  });

  it('should record every balance fetch in a bounded history', async () => {
    const { wallet } = createTestWallet(outageRoutes, 2);

    await wallet.getBalance();
    await wallet.getBalance();
    await wallet.getBalance();

    const history = wallet.balanceHistory();
    expect(history).toHaveLength(2);
    expect(history.every(entry => entry.status === 'pending')).toBe(true);
  });
});

// ─── value, profit and status ─────────────────────────────────────────────────

describe('WalletAggregator.walletValue', () => {
  it('should report counts with placeholder monetary values', async () => {
    const { wallet } = createTestWallet(healthyRoutes());

    const result = await wallet.walletValue();

    expect(result.status).toBe('success');
    expect(result.wallet).toBe(TEST_WALLET);
    expect(result.value).toMatchObject({
      solBalance: 0,
      tokenValue: 0,
      tokenCount: 2,
      nftCount: 3,
      totalUsdValue: 0,
    });
  });

  it('should default the NFT count to zero when the fetch fails', async () => {
    const { wallet } = createTestWallet(outageRoutes);

    const result = await wallet.walletValue();

    expect(result.value.nftCount).toBe(0);
    expect(result.value.tokenCount).toBe(0);
  });
});

describe('WalletAggregator.trackProfit', () => {
  it('should average the total over the sessions', async () => {
    const { wallet } = createTestWallet(healthyRoutes([{ amount: 6 }]));

    await wallet.monitor();
    await wallet.monitor();

    const report = wallet.trackProfit();
    expect(report.totalProfit).toBe(12);
    expect(report.sessions).toBe(2);
    expect(report.averageProfitPerSession).toBe(6);
  });

  it('should report zero before any session', () => {
    const { wallet } = createTestWallet(healthyRoutes());
    expect(wallet.trackProfit()).toMatchObject({ totalProfit: 0, sessions: 0, averageProfitPerSession: 0 });
  });
});

describe('WalletAggregator.status', () => {
  it('should reflect fetched transactions, history and source health', async () => {
    const { wallet } = createTestWallet(healthyRoutes([{ amount: 1 }, { amount: 2 }]));

    await wallet.getTransactions(25);
    await wallet.getBalance();

    const status = wallet.status();
    expect(status.status).toBe('active');
    expect(status.walletAddress).toBe(TEST_WALLET);
    expect(status.transactionCount).toBe(2);
    expect(status.balanceHistorySize).toBe(1);
    expect(status.sources.map(source => [source.name, source.healthy])).toEqual([
      ['helius', true],
      ['solscan', true],
      ['magic-eden', false],
    ]);
  });

  it('should keep the last fetched transactions when a later fetch fails', async () => {
    const solscanRoutes: StubRoutes = {
      [paths.solscanTransactions]: { status: 200, data: [{ amount: 1 }] },
    };
    const { wallet } = createTestWallet({ solscan: solscanRoutes });
    await wallet.getTransactions();

    solscanRoutes[paths.solscanTransactions] = { status: 500 };
    const failed = await wallet.getTransactions();

    expect(failed.status).toBe('pending');
    expect(wallet.status().transactionCount).toBe(1);
  });
});
