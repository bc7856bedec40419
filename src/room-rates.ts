import {
  AppConfigDataClient,
  StartConfigurationSessionCommand,
  GetLatestConfigurationCommand,
} from "@aws-sdk/client-appconfigdata";
import { z } from "zod";
import type { AppConfigIds } from "./config";
import { errorFields, type Logger } from "./logger";

export interface RoomRates {
  rates: Record<string, number>;
  default_rate: number;
}

export const DEFAULT_ROOM_RATES: Readonly<RoomRates> = Object.freeze({
  rates: { single: 89.99, double: 129.99, suite: 249.99 },
  default_rate: 99.99,
});

const RoomRatesSchema = z.object({
  rates: z.record(z.number().nonnegative()),
  default_rate: z.number().nonnegative().default(DEFAULT_ROOM_RATES.default_rate),
});

export interface RoomRateSource {
  getRates(logger: Logger): Promise<RoomRates>;
}

/**
 * Nightly price for a room type. Types are matched case-insensitively;
 * unknown types cost the default rate.
 */
export function pricePerNight(rates: RoomRates, roomType: string): number {
  const key = roomType.toLowerCase();
  const rate = Object.hasOwn(rates.rates, key) ? rates.rates[key] : undefined;
  return rate ?? rates.default_rate;
}

export function parseRoomRates(configuration: Uint8Array | string): RoomRates {
  const text = typeof configuration === "string" ? configuration : new TextDecoder().decode(configuration);
  const parsed = RoomRatesSchema.parse(JSON.parse(text));
  const rates = Object.fromEntries(
    Object.entries(parsed.rates).map(([roomType, price]) => [roomType.toLowerCase(), price])
  );
  return { rates, default_rate: parsed.default_rate };
}

export class StaticRoomRates implements RoomRateSource {
  constructor(private readonly rates: RoomRates = DEFAULT_ROOM_RATES) {}

  async getRates(): Promise<RoomRates> {
    return this.rates;
  }
}

export interface ConfigurationPoller {
  /** Latest configuration bytes, or undefined when unchanged since the last poll. */
  poll(): Promise<Uint8Array | undefined>;
}

/**
 * Polls one AppConfig configuration profile, carrying the session token
 * from call to call.
 */
export class AppConfigSession implements ConfigurationPoller {
  private configurationToken: string | undefined;

  constructor(
    private readonly ids: AppConfigIds,
    private readonly client: AppConfigDataClient = new AppConfigDataClient({})
  ) {}

  async poll(): Promise<Uint8Array | undefined> {
    // Start a new session if we don't have a token
    if (!this.configurationToken) {
      const sessionResponse = await this.client.send(
        new StartConfigurationSessionCommand({
          ApplicationIdentifier: this.ids.application,
          EnvironmentIdentifier: this.ids.environment,
          ConfigurationProfileIdentifier: this.ids.profile,
        })
      );
      this.configurationToken = sessionResponse.InitialConfigurationToken;
    }

    try {
      const configResponse = await this.client.send(
        new GetLatestConfigurationCommand({
          ConfigurationToken: this.configurationToken,
        })
      );
      this.configurationToken = configResponse.NextPollConfigurationToken;

      return configResponse.Configuration;
    } catch (error) {
      // Tokens are single-use; the next poll opens a fresh session
      this.configurationToken = undefined;
      throw error;
    }
  }
}

/**
 * Room rates read from AppConfig. The last good document is cached for warm
 * invocations; when nothing has ever loaded, the default table is used.
 */
export class AppConfigRoomRates implements RoomRateSource {
  private cachedRates: RoomRates | null = null;

  constructor(private readonly poller: ConfigurationPoller) {}

  async getRates(logger: Logger): Promise<RoomRates> {
    try {
      const configuration = await this.poller.poll();

      if (configuration && configuration.length > 0) {
        this.cachedRates = parseRoomRates(configuration);
      }

      if (!this.cachedRates) {
        throw new Error("No configuration available");
      }

      return this.cachedRates;
    } catch (error) {
      logger.error("Failed to get room rates from AppConfig", errorFields(error));
      return this.cachedRates ?? DEFAULT_ROOM_RATES;
    }
  }
}

export function roomRateSource(ids: AppConfigIds | undefined): RoomRateSource {
  return ids ? new AppConfigRoomRates(new AppConfigSession(ids)) : new StaticRoomRates();
}
