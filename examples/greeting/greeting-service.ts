export class GreetingService {
  sayHello(): void {
    console.log("Hello from GreetingService!");
  }

  async sayHelloAsync(name: string): Promise<void> {
    console.log(`Hello ${name} from async service!`);
  }
}
