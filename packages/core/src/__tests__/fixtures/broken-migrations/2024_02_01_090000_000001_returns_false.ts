export default class ReturnsFalse2024_02_01_090000_000001 {

   public up(): boolean {
      return false;
   }

   public down(): boolean {
      return false;
   }

}
