import * as fs from 'fs';
import * as path from 'path';
import { Replay } from '../src/parsers/replay';

// Sample data pools for generating telemetry rows
const drivers = ['Ada Park', 'Ben Ortiz', 'Cleo Young', 'Dev Rao', 'Eli Moss', 'Fay Lund'];
const teams = ['Blue', 'Red', 'Green'];
const statuses = ['ok', 'warn', 'fault'];

const HEADERS = [
  'timestamp',
  'speed',
  'acceleration.x',
  'acceleration.y',
  'acceleration.z',
  'position.latitude',
  'position.longitude',
  'driver.name',
  'driver.age',
  'driver.team',
  'signal[0]',
  'signal[1]',
  'signal[2]',
  'wheels[0].pressure',
  'wheels[1].pressure',
  'status',
];

function randomElement<T>(arr: T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function randomFloat(min: number, max: number, decimals: number = 2): string {
  return (Math.random() * (max - min) + min).toFixed(decimals);
}

function generateRow(index: number, startTime: number): string[] {
  const driver = randomElement(drivers);

  return [
    String(startTime + index),                     // timestamp
    randomFloat(0, 120, 1),                        // speed
    randomFloat(-3, 3),                            // acceleration.x
    randomFloat(-3, 3),                            // acceleration.y
    randomFloat(-1, 1),                            // acceleration.z
    randomFloat(37.7, 37.8, 4),                    // position.latitude
    randomFloat(-122.5, -122.4, 4),                // position.longitude
    `"${driver}"`,                                 // driver.name
    String(randomInt(21, 60)),                     // driver.age
    randomElement(teams),                          // driver.team
    String(randomInt(90, 110)),                    // signal[0]
    String(randomInt(90, 110)),                    // signal[1]
    String(randomInt(90, 110)),                    // signal[2]
    randomFloat(1.8, 2.6),                         // wheels[0].pressure
    randomFloat(1.8, 2.6),                         // wheels[1].pressure
    randomElement(statuses),                       // status
  ];
}

function generateReplayFile(numRows: number, outputPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const writeStream = fs.createWriteStream(outputPath, { encoding: 'utf-8' });
    const startTime = Date.now();
    const firstTimestamp = Math.floor(startTime / 1000);

    writeStream.on('error', (err) => {
      reject(err);
    });

    writeStream.on('finish', () => {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const fileSizeMB = (fs.statSync(outputPath).size / (1024 * 1024)).toFixed(1);

      console.log(`\n✓ Generated replay file:`);
      console.log(`  Path: ${outputPath}`);
      console.log(`  Rows: ${numRows.toLocaleString()}`);
      console.log(`  Size: ${fileSizeMB} MB`);
      console.log(`  Time: ${elapsed}s`);

      resolve();
    });

    writeStream.write('# Generated telemetry for csv-replay\n');
    writeStream.write(`# rows: ${numRows}\n\n`);
    writeStream.write(HEADERS.join(',') + '\n');

    const batchSize = 1000;
    let batch: string[] = [];

    console.log(`Generating replay file with ${numRows.toLocaleString()} rows...`);

    for (let i = 0; i < numRows; i++) {
      batch.push(generateRow(i, firstTimestamp).join(','));

      if (batch.length >= batchSize) {
        writeStream.write(batch.join('\n') + '\n');
        batch = [];
      }

      if ((i + 1) % 100000 === 0) {
        writeStream.write(`  # checkpoint after ${i + 1} rows\n`);
      }
    }

    if (batch.length > 0) {
      writeStream.write(batch.join('\n') + '\n');
    }

    writeStream.end();
  });
}

/**
 * Print the first documents so the header paths can be checked by eye
 */
function preview(filePath: string, count: number): void {
  const replay = new Replay(filePath);
  try {
    replay.play((document, control) => {
      console.log(JSON.stringify(document, null, 2));
      if (control.delivered >= count) {
        control.stop();
      }
    });
  } finally {
    replay.close();
  }
}

// Parse command line arguments
const args = process.argv.slice(2);
const numRows = args[0] ? parseInt(args[0], 10) : 1000;
const previewCount = args[1] ? parseInt(args[1], 10) : 2;

if (isNaN(numRows) || numRows < 1 || isNaN(previewCount) || previewCount < 0) {
  console.error('Error: Invalid arguments');
  console.error('Usage: npm run generate -- <num_rows> [preview_count]');
  console.error('  num_rows: Number of data rows to generate (default: 1000)');
  console.error('  preview_count: Documents to print after generating (default: 2)');
  process.exit(1);
}

const outputPath = path.join(__dirname, `telemetry-${numRows}.csv`);

void (async () => {
  try {
    await generateReplayFile(numRows, outputPath);
    if (previewCount > 0) {
      preview(outputPath, previewCount);
    }
  } catch (error) {
    console.error('Error generating replay file:', error);
    process.exit(1);
  }
})();
