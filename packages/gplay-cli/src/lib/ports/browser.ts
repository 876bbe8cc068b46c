/** Opens the OAuth consent page; tests substitute one that follows the redirect itself. */
export interface BrowserService {
  open(url: string): Promise<void>;
}
