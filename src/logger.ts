import bunyan from "bunyan";
import config from "./config";

const log = bunyan.createLogger({
  name: "minesweeper-agent",
  level: config.logLevel,
});

export default log;
