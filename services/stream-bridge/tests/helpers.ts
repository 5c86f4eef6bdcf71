import { vi } from "vitest";
import { StreamEnvelopeSchema, type StreamEnvelope } from "@epg-link/schemas";
import type { DriverLogger } from "@epg-link/driver-core";
import type { MqttPublisher, PublishOptions } from "../src/mqtt/publisher";

export interface PublishedMessage {
  topic: string;
  envelope: StreamEnvelope;
  retain: boolean;
}

export class FakePublisher implements MqttPublisher {
  public messages: PublishedMessage[] = [];
  public disconnected = false;
  public failWith: Error | null = null;

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.messages.push({
      topic,
      envelope: StreamEnvelopeSchema.parse(JSON.parse(payload)),
      retain: options.retain ?? false
    });
  }

  async disconnect(): Promise<void> {
    this.disconnected = true;
  }

  onTopic(suffix: string): StreamEnvelope[] {
    return this.messages.filter((message) => message.topic.endsWith(`/${suffix}`)).map((message) => message.envelope);
  }
}

export function createTestLogger(): DriverLogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}
