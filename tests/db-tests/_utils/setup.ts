// Imported first by the runners: loggers read NODE_ENV when their modules load.
process.env.NODE_ENV = "test";
