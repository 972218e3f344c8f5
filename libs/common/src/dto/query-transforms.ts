/** Query strings arrive as text; `?isActive=false` must not read as truthy. */
export const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};
