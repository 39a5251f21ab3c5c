import type { JSX } from "react";
import { Box, Text } from "ink";
import type { LauncherViewModel } from "../../services/shortcutRows";
import { ConfigErrorPanel } from "./ConfigErrorPanel";
import { SearchField } from "./SearchField";
import { ShortcutTable } from "./ShortcutTable";

/** Whole launcher screen: search field above, matches or load error below. */
export function LauncherScreen({ model }: { model: LauncherViewModel }): JSX.Element {
  return (
    <Box flexDirection="column">
      <SearchField query={model.query} />
      {model.loadError ? <ConfigErrorPanel error={model.loadError} /> : <ShortcutTable rows={model.rows} />}
      {model.notice ? <Text color="red">{model.notice}</Text> : null}
    </Box>
  );
}
