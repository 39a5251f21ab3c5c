export { ConfigErrorPanel } from "./ConfigErrorPanel";
export { LauncherScreen } from "./LauncherScreen";
export { LauncherView, type LauncherViewProps } from "./LauncherView";
export { SearchField, type SearchFieldProps } from "./SearchField";
export { KIND_STYLES, ShortcutTable, keyColumnWidth, type ShortcutTableProps } from "./ShortcutTable";
