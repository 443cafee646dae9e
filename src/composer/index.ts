export {
  MessageComposer,
  composeMessage,
  composeTitle,
  categoryLabel,
  displayName,
  resolveIconUrl,
} from "./composer.js";
export type { ComposerSettings, ComposeOptions, ComposeInput } from "./composer.js";
