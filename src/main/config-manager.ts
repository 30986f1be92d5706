import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TransferConfig } from '../types';
import { DEFAULT_INDEX_FILENAME } from '../types/sync';
import { InputValidator, ValidationError } from './input-validator';
import { describeError, isErrnoException } from './sync/ErrorHandler';
import SecureLogger from './secure-logger';

export const DEFAULT_CONFIG: TransferConfig = {
  cloudRoot: null,
  containerIdentifier: null,
  accountIdentity: null,
  indexFilename: DEFAULT_INDEX_FILENAME,
  watchContainer: false,
  debug: false
};

export class ConfigManager {
  private config: TransferConfig = { ...DEFAULT_CONFIG };

  constructor(private configPath: string = ConfigManager.defaultConfigPath()) {}

  static defaultConfigPath(): string {
    return process.env.CLOUD_TRANSFER_CONFIG || path.join(os.homedir(), '.cloud-transfer', 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load the config file, writing the defaults when there is none yet.
   * A malformed file is reported and left untouched.
   */
  async initialize(): Promise<TransferConfig> {
    let configData: string;
    try {
      configData = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        SecureLogger.log(`ConfigManager - No config at ${this.configPath}, writing defaults`);
        this.config = { ...DEFAULT_CONFIG };
        await this.saveConfig();
        return this.getConfig();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(configData);
    } catch (error) {
      throw new ValidationError(`Config file ${this.configPath} is not valid JSON: ${describeError(error)}`);
    }

    this.config = { ...DEFAULT_CONFIG, ...ConfigManager.validateConfig(parsed) };
    return this.getConfig();
  }

  getConfig(): TransferConfig {
    return { ...this.config };
  }

  async updateConfig(updates: Partial<TransferConfig>): Promise<TransferConfig> {
    this.config = { ...this.config, ...ConfigManager.validateConfig(updates) };
    await this.saveConfig();
    return this.getConfig();
  }

  static validateConfig(raw: unknown): Partial<TransferConfig> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ValidationError('Config must be a JSON object');
    }

    const validated: Partial<TransferConfig> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (value === undefined) continue;
      switch (key) {
        case 'cloudRoot':
          validated.cloudRoot = InputValidator.validateNullableString(value, key, (v, f) => InputValidator.validatePath(v, f));
          break;
        case 'containerIdentifier':
          validated.containerIdentifier = InputValidator.validateNullableString(value, key, (v, f) => InputValidator.validateIdentifier(v, f));
          break;
        case 'accountIdentity':
          validated.accountIdentity = InputValidator.validateNullableString(value, key, (v, f) => InputValidator.validateString(v, f));
          break;
        case 'indexFilename':
          validated.indexFilename = InputValidator.validateFilename(value, key);
          break;
        case 'watchContainer':
          validated.watchContainer = InputValidator.validateBoolean(value, key);
          break;
        case 'debug':
          validated.debug = InputValidator.validateBoolean(value, key);
          break;
        default:
          SecureLogger.warn(`ConfigManager - Ignoring unknown config key: ${key}`);
      }
    }
    return validated;
  }

  private async saveConfig(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2));
    } catch (error) {
      SecureLogger.error('Failed to save config:', error);
      throw error;
    }
  }
}
