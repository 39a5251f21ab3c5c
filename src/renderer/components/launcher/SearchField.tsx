import type { JSX } from "react";
import { Box, Text } from "ink";

export interface SearchFieldProps {
  query: string;
  placeholder?: string;
}

/** Single-line search field; the cursor always sits at the end. */
export function SearchField({ query, placeholder = "Type a sequence…" }: SearchFieldProps): JSX.Element {
  return (
    <Box borderStyle="round" borderColor="gray" paddingX={1}>
      {query.length > 0 ? <Text>{query}</Text> : <Text dimColor>{placeholder}</Text>}
      <Text inverse> </Text>
    </Box>
  );
}
