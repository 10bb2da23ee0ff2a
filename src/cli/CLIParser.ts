import { ServiceConfig, KeyType, DEFAULT_CONFIG, resolveTreeConfig } from '../common/Config';
import { ConfigError } from '../common/Errors';

export interface CLIOptions {
  readonly config: ServiceConfig;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const alpha = this.getFloat('--alpha');

    const config: ServiceConfig = {
      ...DEFAULT_CONFIG,
      httpPort: this.getPort('--http-port') ?? DEFAULT_CONFIG.httpPort,
      keyType: this.parseKeyType() ?? DEFAULT_CONFIG.keyType,
      verbose: this.hasFlag('--verbose'),
      tree: resolveTreeConfig(alpha === undefined ? DEFAULT_CONFIG.tree : { alpha }),
    };

    return { config, help: false };
  }

  private parseKeyType(): KeyType | undefined {
    const value = this.getString('--key-type');
    if (value === undefined) return undefined;

    const normalized = value.toLowerCase();
    switch (normalized) {
      case 'integer': return KeyType.INTEGER;
      case 'number': return KeyType.NUMBER;
      case 'string': return KeyType.STRING;
      default: throw new ConfigError(`Invalid key type: ${value}. Must be integer, number, or string`);
    }
  }

  /**
   * Value of a flag given as --flag=value or --flag value. A flag that is
   * present without a value is rejected.
   */
  private getString(flag: string): string | undefined {
    const prefix = `${flag}=`;
    const inline = this.args.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) {
      return this.requireValue(flag, inline.slice(prefix.length));
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex === -1) return undefined;

    return this.requireValue(flag, this.args[flagIndex + 1]);
  }

  private requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value.trim() === '' || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
  }

  private getPort(flag: string): number | undefined {
    const str = this.getString(flag);
    if (str === undefined) return undefined;

    const num = Number(str);
    if (!Number.isInteger(num) || num < 0 || num > 65535) {
      throw new ConfigError(`Invalid port for ${flag}: ${str}`);
    }
    return num;
  }

  private getFloat(flag: string): number | undefined {
    const str = this.getString(flag);
    if (str === undefined) return undefined;

    const num = Number(str);
    if (isNaN(num)) {
      throw new ConfigError(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Scapegoat Set Server

Usage: scapegoat-set [options]

Options:
  --help, -h              Show this help message
  --http-port=PORT        HTTP server port (default: 3000)
  --alpha=ALPHA           Balance factor in (0.5, 1) (default: 0.7)
  --key-type=TYPE         Key type: integer, number, string (default: integer)
  --verbose               Log every rebuild

Routes:
  GET    /keys/:key       Search for a key
  PUT    /keys/:key       Insert a key
  DELETE /keys/:key       Remove a key
  DELETE /keys            Remove every key
  GET    /verify          Check ordering and balance
  GET    /stats           Size, height and rebuild counters
  GET    /debug           Pre-order dump of the tree

Examples:
  # Integer keys, default alpha
  scapegoat-set

  # String keys with flatter trees
  scapegoat-set --key-type=string --alpha=0.55 --http-port=8080
`);
  }
}
