export default ["packages/*", "apps/demo"];
