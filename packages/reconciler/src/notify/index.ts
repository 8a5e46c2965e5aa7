export {
  SlackNotifier,
  buildCompletionMessage,
  buildFailureMessage,
  buildStartMessage,
  statusColor,
  successRate,
  type SlackAttachment,
  type SlackColor,
  type SlackField,
  type SlackMessage,
  type SlackNotifierOptions,
  type WebhookPost,
} from "./slack.js";
