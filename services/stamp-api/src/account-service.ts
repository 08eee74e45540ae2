import {
  buildChequebookInfo,
  buildWalletInfo,
  type ChequebookInfo,
  isGatewayError,
  type WalletInfo,
} from "@stamp-gateway/stamp-primitives";
import type { Logger } from "pino";
import type { BeeClient, RequestOptions } from "./bee-client.ts";

export interface AccountServiceOptions {
  client: BeeClient;
  logger: Logger;
}

/**
 * Node wallet and chequebook, read straight through from Bee.
 */
export class AccountService {
  private readonly client: BeeClient;
  private readonly logger: Logger;

  constructor(options: AccountServiceOptions) {
    this.client = options.client;
    this.logger = options.logger;
  }

  async getWallet(options: RequestOptions = {}): Promise<WalletInfo> {
    try {
      const wallet = buildWalletInfo(await this.client.fetchWallet(options));
      this.logger.info(
        { walletAddress: wallet.walletAddress, bzzBalance: wallet.bzzBalance },
        "wallet fetched",
      );
      return wallet;
    } catch (error) {
      this.logFailure(error, "wallet");
      throw error;
    }
  }

  async getChequebook(options: RequestOptions = {}): Promise<ChequebookInfo> {
    try {
      const [address, balance] = await Promise.all([
        this.client.fetchChequebookAddress(options),
        this.client.fetchChequebookBalance(options),
      ]);
      const chequebook = buildChequebookInfo(address, balance);
      this.logger.info(
        {
          chequebookAddress: chequebook.chequebookAddress,
          availableBalance: chequebook.availableBalance,
        },
        "chequebook fetched",
      );
      return chequebook;
    } catch (error) {
      this.logFailure(error, "chequebook");
      throw error;
    }
  }

  private logFailure(error: unknown, resource: string): void {
    if (isGatewayError(error)) {
      this.logger.error(
        { kind: error.kind, status: error.status, resource, error: error.message },
        "account lookup failed",
      );
      return;
    }
    this.logger.error({ err: error, resource }, "account lookup failed unexpectedly");
  }
}
