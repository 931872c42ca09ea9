import bunyan from "bunyan";
import { parseLogLevel } from "@squaremerge/register";

const log = bunyan.createLogger({
  name: "squaremerge-game",
  level: parseLogLevel(process.env.LOG_LEVEL, "warn"),
});

export default log;
