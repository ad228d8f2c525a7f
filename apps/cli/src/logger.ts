import bunyan from "bunyan";

// stdout belongs to the board and prompts
const log = bunyan.createLogger({
  name: "hexbridge",
  level: "warn",
  stream: process.stderr,
  serializers: bunyan.stdSerializers,
});

export function setLogLevel(level: bunyan.LogLevelString): void {
  log.level(level);
}

export default log;
