export class Server {
  accept(): boolean {
    return true;
  }
}
