/**
 * Basic usage examples for hslab, served from an in-memory zarr store
 */

import {
  ConnectionRegistry,
  MultiManager,
  RemoteArray,
  ZarrTransport,
  slice,
} from '../src/index.js';
import type { Transport } from '../src/index.js';

async function main() {
  const transport = new ZarrTransport(new Map<string, Uint8Array>());
  const registry = new ConnectionRegistry<Transport>();
  const handle = registry.register(transport);

  // Example 1: Creating and opening an array
  console.log('=== Example 1: Open an array ===');
  await transport.createArray(
    'temperature',
    { shape: [6, 4], chunks: [2, 4], dtype: 'float32', maxshape: [null, 4] },
    Array.from({ length: 24 }, (_, i) => 20 + i / 2)
  );
  const temps = await RemoteArray.open(registry, handle, 'temperature');
  console.log('Shape:', temps.shape);
  console.log('Chunks:', temps.chunks);
  console.log('Type:', temps.typeItem);

  // Example 2: Hyperslabs, fancy indices and points
  console.log('\n=== Example 2: Selections ===');
  console.log('Rows 1-2:', await temps.read(slice(1, 3)));
  console.log('Every other row, column 0:', await temps.read(slice(null, null, 2), 0));
  console.log('Rows 0 and 5:', await temps.read([0, 5]));
  console.log('Points:', await temps.read([[0, 0], [5, 3]]));

  // Example 3: Writing with broadcasting
  console.log('\n=== Example 3: Writes ===');
  await temps.write(0, slice(0, 2));
  await temps.write([1, 2, 3, 4], slice(4, 6));
  console.log('After writes:', await temps.read());

  // Example 4: Growing and iterating by chunk
  console.log('\n=== Example 4: Resize and chunks ===');
  await temps.resize([8, 4]);
  for await (const { selection, data } of temps.readChunks()) {
    console.log(selection.map((s) => `${s.start}:${s.stop}`).join(','), data);
  }

  // Example 5: One read across several arrays
  console.log('\n=== Example 5: MultiManager ===');
  await transport.createArray('pressure', { shape: [6, 4], chunks: [6, 4], dtype: 'int32' });
  const pressure = await RemoteArray.open(registry, handle, 'pressure');
  const mm = new MultiManager([temps, pressure], { maxWorkers: 2 });
  console.log('First row of each:', await mm.read([0]));

  await registry.release(handle);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
