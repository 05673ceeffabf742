// keep test output readable; tests that assert on logs install their own logger
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent'
