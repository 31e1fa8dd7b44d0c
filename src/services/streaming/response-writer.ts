// StreamWriter over a Node HTTP response
// write() resolves immediately when the socket buffer accepts the frame, otherwise on 'drain'

import type { ServerResponse } from 'http';
import type { StreamWriter } from './streamer.js';

export function createResponseWriter(res: ServerResponse): StreamWriter {
  return {
    write(frame: string): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (res.destroyed || res.writableEnded) {
          reject(new Error('Response stream is closed'));
          return;
        }
        if (res.write(frame)) {
          resolve();
          return;
        }

        const onDrain = () => {
          cleanup();
          resolve();
        };
        const onClose = () => {
          cleanup();
          reject(new Error('Response stream closed while waiting for drain'));
        };
        const cleanup = () => {
          res.off('drain', onDrain);
          res.off('close', onClose);
        };
        res.once('drain', onDrain);
        res.once('close', onClose);
      });
    },

    end(): void {
      if (!res.writableEnded) {
        res.end();
      }
    },

    onClose(listener: () => void): void {
      res.once('close', listener);
    },
  };
}
