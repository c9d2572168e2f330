/*
 * logger definition
 */

import * as W from 'winston'

import * as options from 'options.ts'

const log = W.createLogger({
  level: process.env.LOG_LEVEL ?? options.log_level,
  format: W.format.combine(
    W.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    W.format.errors({
      stack: true
    }),
    W.format.json(),
  ),
  transports: [],
});

// stdout belongs to the game transcript
const stderrLevels = Object.keys(W.config.npm.levels);

if (process.env.NODE_ENV === 'production') {
  log.add(new W.transports.Console({stderrLevels}));
} else {
  log.add(new W.transports.Console({
    stderrLevels,
    format: W.format.combine(
      W.format.colorize(),
      W.format.simple(),
    ),
  }));
}

export default log;
