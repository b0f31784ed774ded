import type { AccessTokenProvider } from "./types";

export class StaticTokenProvider implements AccessTokenProvider {
  private readonly token: string;

  constructor(token: string) {
    if (!token || token.trim() === "") {
      throw new Error("An access token is required. Set NAI_TOKEN or pass `token` to the client.");
    }
    this.token = token.trim();
  }

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}
