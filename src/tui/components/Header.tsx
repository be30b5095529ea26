import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../theme.js';

type HeaderProps = {
  breadcrumb?: string[];
  title?: string;
  // Run settings shown on the right, e.g. "sequence ≥ 0.85".
  detail?: string;
};

export function Header({
  breadcrumb = [],
  title = 'Paddock Merge - F1 entity resolution',
  detail,
}: HeaderProps): React.JSX.Element {
  const [brand, tagline] = title.split(' - ');

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box borderStyle="round" borderColor={theme.border} paddingX={1}>
        <Box flexGrow={1} gap={1}>
          <Text color={theme.brand} bold>
            {brand}
          </Text>
          {tagline ? <Text color={theme.muted}>{tagline}</Text> : null}
        </Box>
        {detail ? <Text color={theme.accent}>{detail}</Text> : null}
      </Box>
      {breadcrumb.length > 0 && (
        <Box flexWrap="wrap">
          {breadcrumb.map((part, index) => (
            <Text
              key={`${part}-${index}`}
              color={index === breadcrumb.length - 1 ? theme.accent : theme.muted}
            >
              {part}
              {index < breadcrumb.length - 1 ? ' / ' : ''}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
