const isTest = process.env.NODE_ENV === "test";

export const logLevel = process.env.DRIVERFETCH_LOG_LEVEL || "warn";

export const disableLogOutput = isTest;
