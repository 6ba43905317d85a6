import pino from "pino";
import { config } from "./config.ts";

// stdout carries CLI output, so log lines go to stderr.
export const logger = pino({ name: "layout-reconstruct", level: config.logLevel }, pino.destination(2));
