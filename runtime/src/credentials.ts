/**
 * Credential Store
 *
 * In-memory only. The host owns persistence and pushes the provider key and
 * the Google access token through set_api_key / set_access_token; the
 * environment can seed the key at start-up.
 */

import { createComponentLogger } from "./logging.js";
import type { Credentials } from "./conductor/types.js";

const log = createComponentLogger("credentials");

export class CredentialStore {
  private apiKey?: string;
  private accessToken?: string;

  constructor(initial: Credentials = {}) {
    this.setApiKey(initial.apiKey);
    this.setAccessToken(initial.accessToken);
  }

  /** An empty value clears the stored key */
  setApiKey(value: string | undefined): void {
    this.apiKey = value?.trim() || undefined;
    log.info(this.apiKey ? "API key set" : "API key cleared");
  }

  setAccessToken(value: string | undefined): void {
    this.accessToken = value?.trim() || undefined;
    log.info(this.accessToken ? "Google access set" : "Google access cleared");
  }

  get(): Credentials {
    return { apiKey: this.apiKey, accessToken: this.accessToken };
  }
}
