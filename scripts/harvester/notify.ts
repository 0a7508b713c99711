export interface NotificationEmbed {
  title: string;
  description?: string;
}

export interface Notifier {
  notify(content: string, embeds?: NotificationEmbed[]): Promise<void>;
}

const MAX_CONTENT_LENGTH = 2000;

/** Posts run milestones to a chat webhook. Delivery failures are logged, never thrown. */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string | undefined,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs = 10_000
  ) {}

  get enabled(): boolean {
    return Boolean(this.url);
  }

  async notify(content: string, embeds?: NotificationEmbed[]): Promise<void> {
    if (!this.url) {
      return;
    }
    try {
      const response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          content: content.slice(0, MAX_CONTENT_LENGTH),
          ...(embeds && embeds.length > 0 ? { embeds } : {}),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        console.warn(`⚠️  [notify] webhook responded ${response.status}`);
      }
    } catch (error) {
      console.warn(`⚠️  [notify] webhook failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
