import { OutcomeChannel } from "../src/download";

async function drain(channel: OutcomeChannel<number>): Promise<number[]> {
  const values: number[] = [];
  for await (const value of channel) {
    values.push(value);
  }
  return values;
}

describe("OutcomeChannel", () => {
  it("delivers buffered values in push order and ends after close", async () => {
    const channel = new OutcomeChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    await expect(drain(channel)).resolves.toEqual([1, 2]);
  });

  it("wakes a waiting reader when a value arrives", async () => {
    const channel = new OutcomeChannel<number>();
    const reading = drain(channel);

    await Promise.resolve();
    channel.push(7);
    await Promise.resolve();
    channel.push(8);
    channel.close();

    await expect(reading).resolves.toEqual([7, 8]);
  });

  it("rejects pushes after close", () => {
    const channel = new OutcomeChannel<number>();
    channel.close();

    expect(() => channel.push(1)).toThrow("Cannot push to a closed channel");
  });
});
