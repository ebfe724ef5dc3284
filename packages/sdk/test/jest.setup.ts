import { Logger } from "@nestjs/common";

// Compiler and satisfier traces are noisy at debug level.
Logger.overrideLogger(["error", "warn"]);
