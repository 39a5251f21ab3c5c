import type { JSX } from "react";
import { Box, Text } from "ink";
import type { ConfigLoadError } from "@shared/types";

/** Shown in place of the shortcut list when the configuration failed to load. */
export function ConfigErrorPanel({ error }: { error: ConfigLoadError }): JSX.Element {
  return (
    <Box flexDirection="column">
      <Text color="red">{error.message}</Text>
      {error.details?.map((issue, index) => (
        <Text key={`${issue.path.join(".")}:${index}`} dimColor>
          {`  ${issue.path.join(".") || "(root)"}: ${issue.message}`}
        </Text>
      ))}
      <Text dimColor>Press Esc to quit.</Text>
    </Box>
  );
}
