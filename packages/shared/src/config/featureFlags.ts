const toBoolean = (value: string | undefined, defaultValue = false): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export const featureFlags = {
  enforceResponseSchema: toBoolean(process.env.ENFORCE_RESPONSE_SCHEMA, true),
};

export const isResponseSchemaEnforced = () => featureFlags.enforceResponseSchema;
