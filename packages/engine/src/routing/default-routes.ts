import { RouteTable } from "./route-table.js";

const TEST_PAGE = "./templates/test.html";

/** The routes a stock server answers, relative to the site root. */
export function createDefaultRouteTable(): RouteTable {
  return RouteTable.from({
    "/": {
      allowedMethods: ["GET"],
      content: "./templates/index.html",
      isFile: true,
    },
    "/test/get": { allowedMethods: ["GET"], content: TEST_PAGE, isFile: true },
    "/test/post": { allowedMethods: ["POST"], content: TEST_PAGE, isFile: true },
    "/test/put": { allowedMethods: ["PUT"], content: TEST_PAGE, isFile: true },
    "/test/post-get": {
      allowedMethods: ["GET", "POST"],
      content: TEST_PAGE,
      isFile: true,
    },
    "/favicon.ico": {
      allowedMethods: ["GET"],
      content: "./static/img/favicon.jpg",
      isFile: true,
    },
  });
}
