import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { FileBackedConfigResource } from "./services/config-resource.js";
import { HotListFetchAdapter } from "./services/fetch-adapter.js";
import { ExecutionIsolationManager } from "./services/isolation-manager.js";
import { createKeywordExpander } from "./services/keyword-expander.js";
import { createChatClient } from "./services/llm-client.js";
import { QueryAssistant } from "./services/query-assistant.js";
import { ReportWriter } from "./services/report-writer.js";
import { createRunHistoryStore } from "./services/run-history.js";
import { SearchService } from "./services/search-service.js";
import { TaskService } from "./services/task-service.js";
import { FileBackedTaskStore } from "./services/task-store.js";
import { errorMessage, logger } from "./utils/logger.js";

const chatClient = createChatClient();
const isolation = new ExecutionIsolationManager(new FileBackedConfigResource(env.CONFIG_PATH));
const reportWriter = new ReportWriter(env.REPORT_DIR);
const searchService = new SearchService({
  isolation,
  fetchAdapter: new HotListFetchAdapter(),
  historyStore: createRunHistoryStore(),
  expander: createKeywordExpander(chatClient),
  reportWriter,
});

const taskStore = new FileBackedTaskStore(env.TASKS_PATH);
await taskStore.load();

const app = createApp({
  searchService,
  taskService: new TaskService(taskStore, searchService),
  isolation,
  reportWriter,
  assistant: new QueryAssistant(searchService, chatClient),
});

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  () => {
    logger.info("server_started", {
      port: env.PORT,
      env: env.NODE_ENV,
      configPath: env.CONFIG_PATH,
    });
  },
);

server.on("error", (error) => {
  logger.error("server_start_failed", {
    port: env.PORT,
    env: env.NODE_ENV,
    error: errorMessage(error),
  });
});
