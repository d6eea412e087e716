export const environment = {
  production: false,
  // Logs every navigation step of every region to the console
  traceNavigation: false
};
