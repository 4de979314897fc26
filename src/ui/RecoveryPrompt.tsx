import { Box, Text, useInput } from "ink";
import type { RecoveryCandidate } from "../autosave/recovery.js";
import { previewLines } from "../format.js";

interface RecoveryPromptProps {
  candidate: RecoveryCandidate;
  onAnswer: (accept: boolean) => void;
  width: number;
}

export function RecoveryPrompt({ candidate, onAnswer, width }: RecoveryPromptProps) {
  useInput((input, key) => {
    if (input === "y" || key.return) {
      onAnswer(true);
    } else if (input === "n" || key.escape) {
      onAnswer(false);
    }
  });

  const { tab, record, content } = candidate;
  const saved = new Date(record.timestamp).toLocaleString();

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" padding={1} width={width}>
      <Text bold color="yellow">Recover unsaved changes?</Text>
      <Box marginTop={1} flexDirection="column">
        <Text>
          {tab.filePath ?? "untitled"}
          <Text dimColor>{`  autosaved ${saved}`}</Text>
        </Text>
        {candidate.replacesExisting && (
          <Text dimColor>Replaces the tab's content from disk.</Text>
        )}
      </Box>
      <Box marginTop={1} flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
        {previewLines(content).map((line, i) => (
          <Text key={i} wrap="truncate">{line || " "}</Text>
        ))}
      </Box>
      <Box marginTop={1}>
        <Text dimColor>y/Enter recover · n/Esc discard</Text>
      </Box>
    </Box>
  );
}
