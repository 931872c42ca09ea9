import bunyan from "bunyan";
import config from "./config";

const log = bunyan.createLogger({
  name: "squaremerge-register",
  level: config.logLevel,
});

export default log;
