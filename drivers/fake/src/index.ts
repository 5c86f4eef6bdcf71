import { FakeBoardPool, type FakeBoardOptions } from "./fake-board";
import type { BleLinkFactory } from "@epg-link/driver-core";

export { FakeBoard, FakeBoardPool, fakeLinkFactory } from "./fake-board";
export type { FakeBoardOptions, StepOutcome } from "./fake-board";

export function createFakeLinkFactory(options: FakeBoardOptions = {}): BleLinkFactory {
  return new FakeBoardPool(options).factory;
}
