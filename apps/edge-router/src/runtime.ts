import type {Server} from 'node:http';

export const createServerRuntime = ({server, host, port}: {server: Server; host: string; port: number}) => {
  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

  const stop = async () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }

      server.close(error => (error ? reject(error) : resolve()));
    });

  return {
    server,
    start,
    stop
  };
};
