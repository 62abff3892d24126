import { createRef } from "react";
import { render, screen } from "@testing-library/react";
import { describe, expect, test, vi } from "vitest";
import type { ServerRecord } from "../types";
import { ServerReel } from "./ServerReel";

vi.mock("lucide-react", () => {
  const Icon = () => <span aria-hidden="true" />;
  return {
    Map: Icon,
    Users: Icon,
  };
});

function makeServer(overrides: Partial<ServerRecord> = {}): ServerRecord {
  return {
    name: "EU #1",
    players: 72,
    maxPlayers: 100,
    map: "Kohat",
    mode: "RAAS",
    country: "DE",
    ...overrides,
  };
}

describe("ServerReel", () => {
  test("asks for a refresh when the list is empty", () => {
    render(<ServerReel servers={[]} offset={0} trackRef={createRef<HTMLDivElement>()} />);

    expect(screen.getByText("The list is empty. Refresh the servers!")).toBeInTheDocument();
    expect(screen.queryByTestId("reel-track")).not.toBeInTheDocument();
  });

  test("repeats the listing along the track", () => {
    const servers = [makeServer({ name: "Alpha" }), makeServer({ name: "Bravo", map: "Narva", players: 98 })];
    render(<ServerReel servers={servers} offset={0} trackRef={createRef<HTMLDivElement>()} />);

    expect(screen.getAllByText("Alpha")).toHaveLength(57);
    expect(screen.getAllByText("Bravo")).toHaveLength(57);
    expect(screen.getAllByText("Narva")).toHaveLength(57);
    expect(screen.getAllByText("98/100")).toHaveLength(57);
  });

  test("positions the track so the offset row sits under the marker", () => {
    const { rerender } = render(
      <ServerReel servers={[makeServer()]} offset={0} trackRef={createRef<HTMLDivElement>()} />
    );
    expect(screen.getByTestId("reel-track").style.transform).toBe("translateY(120px)");

    rerender(<ServerReel servers={[makeServer()]} offset={8080} trackRef={createRef<HTMLDivElement>()} />);
    expect(screen.getByTestId("reel-track").style.transform).toBe("translateY(-7960px)");
  });

  test("hands the track element to the ref", () => {
    const trackRef = createRef<HTMLDivElement>();
    render(<ServerReel servers={[makeServer()]} offset={0} trackRef={trackRef} />);

    expect(trackRef.current).toBe(screen.getByTestId("reel-track"));
  });
});
