export {
  printConversation,
  printRecordList,
  formatRecordSummary,
  type PrintOptions,
  type PrintConversationOptions,
  type OutputSink,
} from "./print.js";
