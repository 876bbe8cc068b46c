/**
 * Questions asked on a terminal when a flag and its environment variable
 * are both missing. Empty answers come back as undefined.
 */
export interface PromptService {
  text(message: string): Promise<string | undefined>;
  /** Input is masked */
  password(message: string): Promise<string | undefined>;
}
