import { strict as assert } from "assert";
import { SharedHandle, UniqueHandle } from "./handles";
import { Registrable } from "./Registrable";
import { RegisterBase } from "./RegisterBase";

function defineLamps() {
  const destroyed: string[] = [];

  class Lamp extends Registrable {
    destroy(): void {
      destroyed.push(this.name());
    }
  }
  const Lamps = new RegisterBase<Lamp>(Lamp);
  class Desk extends Lamp {}
  class Floor extends Lamp {}
  Lamps.register(Desk, "Desk");
  Lamps.register(Floor, "Floor");

  return { Lamps, Desk, Floor, destroyed };
}

describe("UniqueHandle", () => {
  it("should be empty for unknown names", () => {
    const { Lamps } = defineLamps();
    const handle = Lamps.createUnique("Ceiling");

    assert.equal(handle.empty, true);
    assert.equal(handle.get(), null);
  });

  it("should destroy the object on reset", () => {
    const { Lamps, Desk, destroyed } = defineLamps();
    const handle = Lamps.createUnique("Desk");

    assert.ok(handle.get() instanceof Desk);
    handle.reset();
    handle.reset();

    assert.equal(handle.empty, true);
    assert.deepEqual(destroyed, ["Desk"]);
  });

  it("should destroy the old object when given a new one", () => {
    const { Lamps, destroyed } = defineLamps();
    const handle = Lamps.createUnique("Desk");
    const floor = Lamps.create("Floor");

    handle.reset(floor);
    handle.reset(floor);

    assert.equal(handle.get(), floor);
    assert.deepEqual(destroyed, ["Desk"]);
  });

  it("should hand out ownership without destroying", () => {
    const { Lamps, destroyed } = defineLamps();
    const handle = Lamps.createUnique("Floor");

    const lamp = handle.release();

    assert.equal(lamp?.name(), "Floor");
    assert.equal(handle.empty, true);
    assert.deepEqual(destroyed, []);
  });

  it("should move ownership to a new handle", () => {
    const { Lamps, destroyed } = defineLamps();
    const source = Lamps.createUnique("Desk");

    const target = source.move();
    source.reset();

    assert.equal(source.empty, true);
    assert.equal(target.get()?.name(), "Desk");
    assert.deepEqual(destroyed, []);
  });

  it("should destroy the object after use, even when the callback throws", () => {
    const { Lamps, destroyed } = defineLamps();

    const name = Lamps.createUnique("Desk").use((lamp) => lamp.name());
    assert.equal(name, "Desk");

    const failing = Lamps.createUnique("Floor");
    assert.throws(
      () =>
        failing.use(() => {
          throw new Error("switch broke");
        }),
      /switch broke/
    );

    assert.equal(failing.empty, true);
    assert.deepEqual(destroyed, ["Desk", "Floor"]);
  });

  it("should skip the callback when empty", () => {
    let called = false;
    const result = new UniqueHandle<Registrable>().use(() => {
      called = true;
    });

    assert.equal(result, null);
    assert.equal(called, false);
  });
});

describe("SharedHandle", () => {
  it("should be empty for unknown names", () => {
    const { Lamps } = defineLamps();
    const handle = Lamps.createShared("Ceiling");

    assert.equal(handle.empty, true);
    assert.equal(handle.useCount, 0);
    assert.equal(handle.share().empty, true);
  });

  it("should destroy the object when the last owner lets go", () => {
    const { Lamps, destroyed } = defineLamps();
    const first = Lamps.createShared("Floor");
    const second = first.share();

    assert.equal(first.useCount, 2);
    assert.equal(first.get(), second.get());

    first.reset();
    assert.equal(first.empty, true);
    assert.equal(second.useCount, 1);
    assert.deepEqual(destroyed, []);

    second.reset();
    second.reset();
    assert.equal(second.useCount, 0);
    assert.deepEqual(destroyed, ["Floor"]);
  });

  it("should wrap a plain object", () => {
    const { Lamps } = defineLamps();
    const lamp = Lamps.create("Desk");
    const handle = SharedHandle.of(lamp);

    assert.equal(handle.get(), lamp);
    assert.equal(handle.useCount, 1);
  });
});
