export { ScriptedChatModel } from "./scripted-chat-model.js";
export type { ScriptedReply } from "./scripted-chat-model.js";
