export { loadConfig, type LogLevel, type TermpickConfig } from "./config";
export {
    LineEditor,
    type LineEditorOptions,
    MultilineEditor,
    type MultilineEditorOptions,
    ScrollState,
} from "./editing";
export {
    CanceledError,
    ConfigError,
    InputClosedError,
    isCanceled,
    isQuit,
    QuitError,
    WidgetConfigError,
} from "./errors";
export {
    controlBindings,
    defaultHelpStyles,
    type HelpOptions,
    type HelpStyles,
    type KeyBinding,
    keySymbol,
    renderHelp,
} from "./help";
export {
    defaultItemListStyles,
    ItemList,
    type ItemListOptions,
    type ItemListStyles,
    type ListItem,
    listItem,
} from "./item-list";
export { isPrintable, keyMsg, keyName, type KeyMsg, type Msg, resizeMsg, type ResizeMsg } from "./keys";
export { createLogger, getLogger } from "./logger";
export { errorOrValidate, type Outcome, type StandardWidget, toOutcome } from "./outcome";
export { applyFormat, defaultPickerStyles, Picker, type PickerOptions, type PickerStyles } from "./picker";
export { input, pick, type PickOptions, selectItem, textarea } from "./prompts";
export { prompt, run } from "./runner";
export { isShowcaseName, SHOWCASES, showcase, type ShowcaseContext, type ShowcaseName } from "./showcase";
export {
    type IDisplaySink,
    type IInputSource,
    KeypressSource,
    type RunIO,
    TerminalDisplay,
    terminalIO,
    type TerminalIOOptions,
} from "./terminal";
export {
    defaultTextAreaStyles,
    normalizeLines,
    TextArea,
    type TextAreaOptions,
    type TextAreaStyles,
} from "./text-area";
export { defaultTextInputStyles, TextInput, type TextInputOptions, type TextInputStyles } from "./text-input";
export {
    type Cmd,
    type IModel,
    plain,
    type Style,
    Widget,
    type WidgetControls,
    type WidgetState,
} from "./widget";
