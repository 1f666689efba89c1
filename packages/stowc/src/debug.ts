import createDebug from "debug";

export const logger = {
  derive: createDebug("stowc:derive"),
  classify: createDebug("stowc:classify"),
  compile: createDebug("stowc:compile"),
  cli: createDebug("stowc:cli"),
  error: createDebug("stowc:error"),
};

// Pipe debug output to stdout instead of stderr
logger.derive.log = console.debug.bind(console);
logger.classify.log = console.debug.bind(console);
logger.compile.log = console.debug.bind(console);
logger.cli.log = console.debug.bind(console);

// Pipe error output to stderr
logger.error.log = console.error.bind(console);
