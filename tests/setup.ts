// Keep pino quiet and away from ~/.docmd during tests.
process.env.DOCMD_LOG_LEVEL = "silent";
