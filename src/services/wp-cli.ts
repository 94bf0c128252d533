import { ExecResult, IComposeService } from './docker-interface.js';

export const WORDPRESS_SERVICE = 'wordpress';

const DEFAULT_HTACCESS = `# BEGIN WordPress
<IfModule mod_rewrite.c>
RewriteEngine On
RewriteBase /
RewriteRule ^index\\.php$ - [L]
RewriteCond %{REQUEST_FILENAME} !-f
RewriteCond %{REQUEST_FILENAME} !-d
RewriteRule . /index.php [L]
</IfModule>
# END WordPress`;

const lines = (output: string): string[] =>
  output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);

/**
 * WP-CLI inside the instance's WordPress container.
 */
export class WordPressCli {
  private readonly compose: IComposeService;

  constructor(compose: IComposeService) {
    this.compose = compose;
  }

  async activateTheme(name: string): Promise<boolean> {
    return (await this.run(['theme', 'activate', name])).exitCode === 0;
  }

  async administratorIds(): Promise<string[]> {
    const result = await this.run(['user', 'list', '--field=ID', '--role=administrator']);
    return result.exitCode === 0 ? lines(result.stdout) : [];
  }

  async cacheFlush(): Promise<boolean> {
    return (await this.run(['cache', 'flush'])).exitCode === 0;
  }

  async createAdministrator(user: string, email: string, password: string): Promise<boolean> {
    const result = await this.run(['user', 'create', user, email, '--role=administrator', `--user_pass=${password}`]);
    return result.exitCode === 0;
  }

  /** Database reachability as WordPress sees it. */
  async dbCheck(): Promise<boolean> {
    return (await this.run(['db', 'check'])).exitCode === 0;
  }

  /**
   * Writes the stock WordPress rewrite block when `.htaccess` is missing or empty.
   */
  async ensureHtaccess(): Promise<boolean> {
    const script = `if [ ! -s /var/www/html/.htaccess ]; then cat > /var/www/html/.htaccess <<'HTEOF'\n${DEFAULT_HTACCESS}\nHTEOF\nfi`;
    const result = await this.compose.exec(WORDPRESS_SERVICE, ['bash', '-c', script]);
    return result.exitCode === 0;
  }

  async isInstalled(): Promise<boolean> {
    return (await this.run(['core', 'is-installed'])).exitCode === 0;
  }

  /** Trimmed option value, undefined when the command fails or prints nothing. */
  async optionGet(name: string): Promise<string | undefined> {
    const result = await this.run(['option', 'get', name]);
    const value = result.stdout.trim();
    return result.exitCode === 0 && value ? value : undefined;
  }

  async rewriteFlush(): Promise<boolean> {
    return (await this.run(['rewrite', 'flush', '--hard'])).exitCode === 0;
  }

  async rewriteStructure(structure: string): Promise<boolean> {
    return (await this.run(['rewrite', 'structure', structure])).exitCode === 0;
  }

  run(args: string[]): Promise<ExecResult> {
    return this.compose.exec(WORDPRESS_SERVICE, ['wp', ...args, '--allow-root']);
  }

  async searchReplace(from: string, to: string): Promise<boolean> {
    const result = await this.run(['search-replace', from, to, '--all-tables', '--report-changed-only']);
    return result.exitCode === 0;
  }

  async setPassword(user: string, password: string): Promise<boolean> {
    return (await this.run(['user', 'update', user, `--user_pass=${password}`])).exitCode === 0;
  }

  async themeNames(): Promise<string[]> {
    const result = await this.run(['theme', 'list', '--field=name']);
    return result.exitCode === 0 ? lines(result.stdout) : [];
  }
}
