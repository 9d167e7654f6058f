export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as ConsoleSink from "./console_sink";
export * as Discovery from "./discovery";
export * as Errors from "./errors";
export * as EventBus from "./event_bus";
export * as Execution from "./execution";
export * as FileLister from "./file_lister";
export * as FileWriter from "./file_writer";
export * as Logger from "./logger";
export * as Report from "./report";
export * as RunSession from "./run_session";
export * as TestFramework from "./test_framework";
export * as TestRegistry from "./test_registry";
export * as TestTags from "./test_tags";
export * as Utils from "./utils";

// Authoring API used by test files while they load
export { test, suite, skip } from "./test_framework";
export { tags } from "./test_tags";
