export const smokeTemplate = `version: "0.1"
canvas:
  width: 8
  height: 6
  background: black

frames:
  - id: diagonal
    label: "Diagonal"
    shapes:
      - type: line
        from: [-3.5, 2.5]
        to: [1.5, -2.5]
        stroke: { color: "#ff0000" }
`;
