import mqtt, { type MqttClient as RawMqttClient } from "mqtt";
import type { DriverLogger } from "@epg-link/driver-core";

export interface PublishOptions {
  retain?: boolean;
}

export interface MqttPublisher {
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  disconnect(): Promise<void>;
}

export interface RealMqttPublisherOptions {
  url: string;
  clientId?: string;
  logger?: DriverLogger;
}

export class RealMqttPublisher implements MqttPublisher {
  private readonly client: RawMqttClient;

  constructor(options: RealMqttPublisherOptions) {
    this.client = mqtt.connect(options.url, { clientId: options.clientId, reconnectPeriod: 1_000 });
    // the client reconnects by itself
    this.client.on("error", (err) => {
      options.logger?.warn({ err, url: options.url }, "stream-bridge: mqtt client error");
    });
  }

  async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.publish(topic, payload, { qos: 0, retain: options.retain ?? false }, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async disconnect(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.end(false, {}, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}
