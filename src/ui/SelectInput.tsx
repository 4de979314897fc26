import { Text, useInput } from "ink";

export interface SelectOption<T extends string> {
  label: string;
  value: T;
}

interface SelectInputProps<T extends string> {
  options: ReadonlyArray<SelectOption<T>>;
  value: T;
  onChange: (value: T) => void;
  focus: boolean;
}

/** Inline ◂ value ▸ picker cycled with the arrow keys. */
export function SelectInput<T extends string>({ options, value, onChange, focus }: SelectInputProps<T>) {
  useInput(
    (_input, key) => {
      if (options.length === 0) return;
      const idx = Math.max(0, options.findIndex((o) => o.value === value));
      if (key.leftArrow) {
        onChange(options[(idx - 1 + options.length) % options.length].value);
      } else if (key.rightArrow) {
        onChange(options[(idx + 1) % options.length].value);
      }
    },
    { isActive: focus },
  );

  const label = options.find((o) => o.value === value)?.label ?? value;

  if (focus) {
    return (
      <Text>
        <Text color="cyan">{"◂ "}</Text>
        <Text>{label}</Text>
        <Text color="cyan">{" ▸"}</Text>
      </Text>
    );
  }

  return <Text>{label}</Text>;
}
