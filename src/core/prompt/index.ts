export { composePrompt, type ComposeInput, type ComposedPrompt } from "./promptComposer.js";
