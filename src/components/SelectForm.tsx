import React from 'react';

export interface SelectOption {
  value: string;
  label: string;
}

interface SelectFormProps {
  /** Form target (the current page) */
  action: string;
  /** Query parameter the selection is sent as */
  name: string;
  label: string;
  options: SelectOption[];
  selected: string;
  /** Extra query parameters carried along, e.g. the selected customer */
  hidden?: Record<string, string>;
}

/**
 * GET form with a single select and a submit button
 */
export default function SelectForm({
  action,
  name,
  label,
  options,
  selected,
  hidden = {},
}: SelectFormProps): React.JSX.Element {
  const id = `select-${name}`;

  return (
    <form method="get" action={action} className="select-form">
      {Object.entries(hidden).map(([key, value]) => (
        <input key={key} type="hidden" name={key} value={value} />
      ))}
      <label htmlFor={id}>{label}</label>
      <select id={id} name={name} defaultValue={selected}>
        {options.map((option) => (
          <option key={option.value} value={option.value}>
            {option.label}
          </option>
        ))}
      </select>
      <button type="submit" className="btn btn-secondary">Show</button>
    </form>
  );
}
