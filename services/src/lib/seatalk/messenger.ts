import { logger } from "@/lib/logger";
import type { AppAccessTokenCache, FetchFn } from "@/lib/seatalk/token-cache";

const MESSAGE_TIMEOUT_MS = 10_000;

export interface Messenger {
  sendDirectMessage(employeeCode: string, text: string): Promise<boolean>;
}

export class SeaTalkMessenger implements Messenger {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly apiBase: string,
    private readonly tokens: Pick<AppAccessTokenCache, "getToken">,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  /** True when SeaTalk answered HTTP 200. No retry. */
  async sendDirectMessage(employeeCode: string, text: string): Promise<boolean> {
    const token = await this.tokens.getToken();
    const response = await this.fetchFn(`${this.apiBase}/messaging/v2/single_chat`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        employee_code: employeeCode,
        message: { tag: "text", text: { content: text } },
      }),
      signal: AbortSignal.timeout(MESSAGE_TIMEOUT_MS),
    });

    const body = await response.text();
    logger.info("SeaTalk message sent", {
      employeeCode,
      status: response.status,
      body: body.slice(0, 200),
    });
    return response.status === 200;
  }
}
