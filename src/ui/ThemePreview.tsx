import { Box, Text } from "ink";
import type { ThemeSpec } from "../theme/types.js";

interface ThemePreviewProps {
  spec: ThemeSpec | null;
  width: number;
}

const SWATCH = "  ";

function Swatch({ color }: { color: string }) {
  return <Text backgroundColor={color}>{SWATCH}</Text>;
}

export function ThemePreview({ spec, width }: ThemePreviewProps) {
  if (!spec) {
    return (
      <Box borderStyle="round" borderColor="gray" paddingX={1} width={width}>
        <Text dimColor>Resolving theme…</Text>
      </Box>
    );
  }

  const normal = spec.palette.slice(0, 8);
  const bright = spec.palette.slice(8);
  const modeColor = spec.mode === "live" ? "green" : spec.mode === "system" ? "yellow" : "gray";

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} width={width}>
      <Box justifyContent="space-between">
        <Text>
          <Text bold color="cyan">Theme </Text>
          <Text>{spec.sourceId}</Text>
        </Text>
        <Text color={modeColor}>{spec.mode}</Text>
      </Box>
      <Box marginTop={1}>
        <Text backgroundColor={spec.background} color={spec.foreground}>
          {" The quick brown fox "}
        </Text>
        <Text backgroundColor={spec.selectionBackground} color={spec.selectionForeground}>
          {" selected "}
        </Text>
        <Text backgroundColor={spec.cursor}>{" "}</Text>
        <Text>{"  "}</Text>
        <Text color={spec.accent}>● accent</Text>
      </Box>
      <Box marginTop={1}>
        {normal.map((c, i) => <Swatch key={`n${i}`} color={c} />)}
      </Box>
      <Box>
        {bright.map((c, i) => <Swatch key={`b${i}`} color={c} />)}
      </Box>
    </Box>
  );
}
