import log from 'electron-log/node';

// Keep test runs quiet and off the default log file location.
log.transports.file.level = false;
log.transports.console.level = false;
