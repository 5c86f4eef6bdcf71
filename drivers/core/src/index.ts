export type { BleLink, BleLinkFactory, DriverLogger, NotificationListener } from "./types";
