#!/usr/bin/env node
import { HELP_TEXT, loadConfig, parseCliArgs, readVersion } from "./config.js";
import { PipelineAssembler } from "./assembler.js";
import { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { createGitRunner, createVersionSource } from "./version-source.js";

const cli = parseCliArgs(process.argv.slice(2));

if (cli.version) {
  console.log(readVersion());
  process.exit(0);
}

if (cli.help) {
  console.log(HELP_TEXT);
  process.exit(0);
}

const config = loadConfig(cli);
const logger = new Logger(config.verbose);

logger.info(msg.starting(config.root));
logger.debug(msg.configLoaded(config.strategy, config.floatingBranch, config.verbose));

const versions = createVersionSource(config.strategy, {
  root: config.root,
  testSuitesDir: config.testSuitesDir,
  floatingBranch: config.floatingBranch,
  git: createGitRunner(config.root),
  logger,
});

const assembler = new PipelineAssembler(config, versions, logger);

try {
  await assembler.emit(assembler.assemble());
} catch (err) {
  logger.error(msg.fatal, err);
  throw err;
}
