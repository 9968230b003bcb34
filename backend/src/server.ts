import { loadConfig } from './config';
import { createApp } from './app';
import { FileActivityLog } from './services/activityLog';
import { FleetRegistry } from './services/fleetRegistry';
import { RentalLedger } from './services/rentalLedger';
import { RentalService } from './services/rentalService';
import { loadFleetSeed, parseFleetSeed } from './services/fleetSeed';
import defaultFleet from './data/fleet.json';

const config = loadConfig();

// Without the activity log nothing may be rented
function openActivityLog(filePath: string): FileActivityLog {
  try {
    return FileActivityLog.open(filePath);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(`Fatal: cannot open activity log ${filePath}:`, e);
    return process.exit(1);
  }
}

const activity = openActivityLog(config.logPath);

const fleet = new FleetRegistry();
const seed = config.fleetPath ? loadFleetSeed(config.fleetPath) : parseFleetSeed(defaultFleet);
seed.forEach(v => fleet.add(v));

const service = new RentalService(fleet, new RentalLedger(), activity);
const app = createApp(service);

// Boot
const server = app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${config.port} (${fleet.size} vehicles)`);
});

function shutdown() {
  server.close(() => {
    activity.close();
    process.exit(0);
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
