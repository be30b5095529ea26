import React from 'react';
import { Box, Text, type BoxProps } from 'ink';
import { theme, type PanelTone } from '../theme.js';

type PanelProps = {
  title: string;
  children: React.ReactNode;
  tone?: PanelTone;
  // Right-aligned next to the title, e.g. a count.
  badge?: string;
  boxProps?: BoxProps;
};

function toneColors(tone: PanelTone): { border: string; title: string } {
  switch (tone) {
    case 'accent':
      return { border: theme.accent, title: theme.accent };
    case 'warning':
      return { border: theme.status.warning, title: theme.status.warning };
    case 'muted':
      return { border: theme.muted, title: theme.panelTitle };
    default:
      return { border: theme.border, title: theme.panelTitle };
  }
}

export function Panel({
  title,
  children,
  tone = 'neutral',
  badge,
  boxProps,
}: PanelProps): React.JSX.Element {
  const colors = toneColors(tone);

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={colors.border}
      paddingX={1}
      {...boxProps}
    >
      <Box>
        <Box flexGrow={1}>
          <Text color={colors.title}>{title}</Text>
        </Box>
        {badge ? <Text color={theme.muted}>{badge}</Text> : null}
      </Box>
      <Box flexDirection="column" marginTop={1}>
        {children}
      </Box>
    </Box>
  );
}
